import { config } from './config.js';
import { createBoardServer } from './app.js';

const { server, wss } = createBoardServer({
  port: config.port,
  boardDir: config.boards.dir,
  deliveryTimeoutMs: config.session.deliveryTimeoutMs,
  approvalTimeoutMs: config.session.approvalTimeoutMs,
  onClosed: () => {
    // eslint-disable-next-line no-console
    console.log('[relay] session closed, shutting down');
    for (const client of wss.clients) client.terminate();
    wss.close();
    server.close(() => {
      if (config.session.exitOnClose) process.exit(0);
    });
    server.closeAllConnections();
  }
});

server.on('error', (error) => {
  console.error(`[relay] cannot listen on ${config.host}:${config.port}:`, error);
  process.exit(1);
});

server.listen(config.port, config.host, () => {
  // eslint-disable-next-line no-console
  console.log(`[relay] listening on ${config.host}:${config.port}`);
});
