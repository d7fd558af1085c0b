/**
 * Example flow: research a topic, gather references in parallel, write a
 * draft from both, then edit it.
 *
 * The "agents" here are canned stand-ins; a real host would pass model or
 * tool clients as the agent handle and call them from the unit of work.
 */

import { ExecutorOptions } from '../config';
import { fail, succeed } from '../domain/step';
import { FlowManager } from '../engine/flow-manager';

/** Minimal agent contract used by the example steps. */
export interface WriterAgent {
  role: string;
  process(prompt: string, signal: AbortSignal): Promise<string>;
}

/** An agent that echoes a canned answer after an optional delay. */
export function createCannedAgent(role: string, delayMs: number = 0): WriterAgent {
  return {
    role,
    process(prompt, signal) {
      return new Promise((resolve, reject) => {
        const onAbort = () => {
          clearTimeout(timer);
          reject(new Error(`${role} canceled`));
        };
        const timer = setTimeout(() => {
          signal.removeEventListener('abort', onAbort);
          resolve(`[${role}] ${prompt}`);
        }, delayMs);
        signal.addEventListener('abort', onAbort, { once: true });
      });
    },
  };
}

export function createBlogFlow(
  agents: Record<'researcher' | 'librarian' | 'writer' | 'editor', WriterAgent> = {
    researcher: createCannedAgent('researcher'),
    librarian: createCannedAgent('librarian'),
    writer: createCannedAgent('writer'),
    editor: createCannedAgent('editor'),
  },
  options?: Partial<ExecutorOptions>,
): FlowManager<WriterAgent> {
  return new FlowManager<WriterAgent>('blog', options)
    .addStep({
      name: 'research',
      agent: agents.researcher,
      description: 'Collect key facts about the topic',
      run: async ({ input, agent, signal }) => {
        const topic = typeof input.topic === 'string' ? input.topic : '';
        if (!agent) return fail(new Error('research requires an agent'));
        if (!topic) return fail(new Error('input.topic is required'));
        return succeed({ findings: await agent.process(`research ${topic}`, signal) });
      },
    })
    .addStep({
      name: 'references',
      agent: agents.librarian,
      description: 'Find sources to cite',
      run: async ({ input, agent, signal }) => {
        if (!agent) return fail(new Error('references requires an agent'));
        return succeed({ sources: [await agent.process(`sources for ${String(input.topic)}`, signal)] });
      },
      // Citations are optional; publish without them rather than skip the post.
      onError: () => succeed({ sources: [] }),
    })
    .addStep({
      name: 'write',
      agent: agents.writer,
      requires: ['research', 'references'],
      description: 'Draft the post',
      run: async ({ context, agent, signal }) => {
        if (!agent) return fail(new Error('write requires an agent'));
        const findings = String(context.research?.findings ?? '');
        return succeed({ draft: await agent.process(`write about: ${findings}`, signal) });
      },
    })
    .addStep({
      name: 'edit',
      agent: agents.editor,
      requires: ['write'],
      description: 'Tighten the draft',
      run: async ({ context, agent, signal }) => {
        if (!agent) return fail(new Error('edit requires an agent'));
        const draft = String(context.write?.draft ?? '');
        return succeed({ finalPost: await agent.process(`edit: ${draft}`, signal) });
      },
    });
}
