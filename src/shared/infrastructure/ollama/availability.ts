import net from 'net';
import { errorMessage } from '../../domain/errors';
import { Logger, rootLogger } from '../logging/logger';

export type AvailabilityProbe = () => Promise<boolean>;

/**
 * Plain TCP connect to host:port. Resolves false on refusal, timeout or any
 * socket error.
 */
export function isPortOpen(
  host: string,
  port: number,
  timeoutMs = 1000,
  logger: Logger = rootLogger.child('probe')
): Promise<boolean> {
  return new Promise(resolve => {
    let socket: net.Socket | undefined;
    let settled = false;
    const finish = (open: boolean) => {
      if (settled) return;
      settled = true;
      socket?.destroy();
      resolve(open);
    };

    try {
      socket = net.createConnection({ host, port });
      socket.setTimeout(timeoutMs);
    } catch (error) {
      // invalid host/port options throw before any socket event
      logger.warn(`❌ Cannot connect to ${host}:${port}: ${errorMessage(error)}`);
      finish(false);
      return;
    }
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => {
      logger.warn(`⏱️ Connection to ${host}:${port} timed out.`);
      finish(false);
    });
    socket.once('error', error => {
      logger.warn(`❌ Connection to ${host}:${port} failed: ${errorMessage(error)}`);
      finish(false);
    });
  });
}

export const tcpProbe = (host: string, port: number, timeoutMs?: number, logger?: Logger): AvailabilityProbe =>
  () => isPortOpen(host, port, timeoutMs, logger);
