import path from 'node:path';

export const config = {
  port: Number(process.env.PORT ?? 8787),
  host: process.env.HOST ?? '0.0.0.0',
  session: {
    deliveryTimeoutMs: Number(process.env.BOARD_DELIVERY_TIMEOUT_MS ?? 5_000),
    // 0 keeps applicants waiting until the manager decides
    approvalTimeoutMs: Number(process.env.BOARD_APPROVAL_TIMEOUT_MS ?? 0),
    exitOnClose: (process.env.BOARD_CLOSE_EXIT ?? 'true') !== 'false'
  },
  boards: {
    dir: process.env.BOARD_DIR ?? path.resolve(process.cwd(), 'boards')
  }
};
