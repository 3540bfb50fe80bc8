import type http from 'node:http';
import { requireReasoningCredential } from '../../config/index.js';
import { startHttpServer, stopHttpServer } from '../../api/http_server.js';
import { logInfo } from '../../telemetry/logger.js';
import { parseCommandArgs, parsePort } from '../args.js';
import type { CommandContext } from './context.js';

export interface ServeCommandResult {
  server: http.Server;
  port: number;
  /** Resolves once a shutdown signal has closed the server. */
  closed: Promise<void>;
}

export async function serveCommand({ locator, args }: CommandContext): Promise<ServeCommandResult> {
  const { values } = parseCommandArgs({
    args,
    options: {
      port: { type: 'string' },
      host: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: false,
  });

  // Fail before listening rather than on the first request.
  requireReasoningCredential(locator.config);
  const service = locator.getCitationService();

  const { server, port } = await startHttpServer({
    service,
    port: parsePort(values.port) ?? locator.config.port,
    host: values.host,
  });
  console.log(`lexlocator API listening on http://${values.host ?? 'localhost'}:${port}`);

  const closed = new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logInfo('Shutting down', { signal });
      process.removeListener('SIGINT', shutdown);
      process.removeListener('SIGTERM', shutdown);
      stopHttpServer(server).then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

  return { server, port, closed };
}
