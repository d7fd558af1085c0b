/**
 * Entry point for the introspection server. Registers the example flow and
 * serves its graph read-only.
 */

import { loadExecutorOptionsFromEnv } from './config';
import { createBlogFlow } from './examples/blog-flow';
import { logger } from './logger';
import { createApp, createAppContext } from './server';

const PORT = parseInt(process.env.PORT ?? '5000', 10);

const options = loadExecutorOptionsFromEnv(process.env);
const context = createAppContext([createBlogFlow(undefined, options)]);
const app = createApp(context);

app.listen(PORT, () => {
  logger.info('Flow introspection server listening', { port: PORT, flows: context.flows.size });
});
