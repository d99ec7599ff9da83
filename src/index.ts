// Relay Agent server
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import { Agent } from './agent.js';
import { configFromEnv, env, logConfiguration } from './env.js';
import { logger, loggerOptions } from './logger.js';
import { agentRoutes } from './routes/agent.js';
import { errorMessage } from './utils/errors.js';

const PORT = env.PORT;
const HOST = env.HOST;

const config = configFromEnv();

let agent: Agent;
try {
  agent = new Agent(config);
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, 'Could not create agent');
  process.exit(1);
}

if (env.TOOLS_CONFIG_FILE) {
  try {
    const registered = await agent.addToolsFromFile(env.TOOLS_CONFIG_FILE);
    logger.info({ servers: registered }, 'Registered tool servers from config');
  } catch (error) {
    logger.fatal({ error: errorMessage(error), file: env.TOOLS_CONFIG_FILE }, 'Could not register tool servers');
    process.exit(1);
  }
}

const server = Fastify({
  logger: loggerOptions(env.LOG_LEVEL),
});

// Main health endpoint with /v1 prefix
server.get('/v1/health', async () => {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    agent: agent.isInitialized ? 'ready' : 'starting',
  };
});

await server.register(agentRoutes, { prefix: '/v1', agent });

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  server.log.info({ signal }, 'Shutting down');

  try {
    await server.close();
    await agent.shutdown();
    process.exit(0);
  } catch (error) {
    server.log.error({ error: errorMessage(error) }, 'Shutdown failed');
    process.exit(1);
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

// Start server
try {
  const report = await agent.initialize();
  if (report.failed.length > 0) {
    server.log.warn({ failed: report.failed }, 'Some tool servers failed to launch');
  }

  await server.listen({ port: PORT, host: HOST });
  logConfiguration(config);
} catch (err) {
  server.log.error(err);
  await agent.shutdown().catch((error: unknown) => {
    server.log.error({ error: errorMessage(error) }, 'Shutdown after failed start');
  });
  process.exit(1);
}
