import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createAppContext, createServer } from './createServer.js';
import { createHttpApp } from './api/httpApp.js';
import { ConfigurationManager } from './config/ConfigurationManager.js';
import { logger } from './utils/index.js';

const main = async (): Promise<void> => {
  const config = ConfigurationManager.getInstance();
  const context = await createAppContext(config);
  const server = createServer(context);

  const httpPort = config.getHttpPort();
  if (httpPort) {
    const app = createHttpApp(context.chat, context.historyWindow);
    app.listen(httpPort, () => {
      logger.info(`HTTP chat API listening on port ${httpPort}`);
    });
  }

  const transport = new StdioServerTransport();
  logger.info({ transport: transport.constructor.name }, 'Connecting transport');
  await server.connect(transport);
  logger.info('MCP Server connected and listening');

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => context.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
