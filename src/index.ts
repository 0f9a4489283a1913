#!/usr/bin/env node
/**
 * Transfer Fault Proxy
 *
 * TCP proxy placed between a transfer client and server. Every accepted
 * client connection gets its own upstream connection and its own pair of
 * fault filter stacks.
 */

import { createConnection, createServer, type AddressInfo, type Server, type Socket } from 'net';
import type { ChunkClassifier } from './codec/classifier.js';
import { loadConfig, type ProxyConfig } from './config.js';
import { ProxySession } from './proxy/session.js';
import { logger } from './utils/logger.js';

export { TransferChunkClassifier, defaultChunkClassifier, type ChunkClassifier } from './codec/classifier.js';
export { ChunkType, type ChunkDescriptor } from './codec/chunk.js';
export { encodeUiFrame, HdlcFrameDecoder, type HdlcFrame } from './codec/hdlc.js';
export { loadConfig, parseFilterStackConfig, type FilterConfig, type FilterStackConfig } from './config.js';
export { ConfigurationError, ErrorCodes, ProxyError, TransportError, isProxyError } from './errors.js';
export { EventDispatcher } from './events/dispatcher.js';
export { EventType, createEvent, type EventHandler, type ProxyEvent } from './events/types.js';
export { DataDropper } from './filters/data-dropper.js';
export { DataTransposer } from './filters/data-transposer.js';
export { EventFilter } from './filters/event-filter.js';
export { Filter, type SendFn } from './filters/filter.js';
export { HdlcPacketizer } from './filters/hdlc-packetizer.js';
export { KeepDropQueue } from './filters/keep-drop-queue.js';
export { RateLimiter } from './filters/rate-limiter.js';
export { ServerFailure } from './filters/server-failure.js';
export { WindowPacketDropper } from './filters/window-packet-dropper.js';
export { buildFilterStack, type FilterStack } from './proxy/filter-stack.js';
export { ProxySession } from './proxy/session.js';
export { AsyncQueue } from './utils/async-queue.js';
export { SeededRandom, type RandomSource } from './utils/random.js';

export interface FaultProxyOptions {
  classifier?: ChunkClassifier;
}

export interface FaultProxy {
  server: Server;
  config: ProxyConfig;
  /** Sessions currently relaying traffic */
  sessions: ReadonlySet<ProxySession>;
  address: () => AddressInfo;
  shutdown: () => Promise<void>;
}

function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? '?'}`;
}

function connectUpstream(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host, port, allowHalfOpen: true });
    const onError = (error: Error) => {
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      socket.off('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Create and start the proxy
 */
export async function createFaultProxy(
  configOverrides: Partial<ProxyConfig> = {},
  options: FaultProxyOptions = {}
): Promise<FaultProxy> {
  const config = { ...loadConfig(), ...configOverrides };
  const { network, filters } = config;
  const sessions = new Set<ProxySession>();

  logger.info('[Proxy] Starting...', {
    clientFilters: filters.clientFilterStack.map((filter) => filter.type),
    serverFilters: filters.serverFilterStack.map((filter) => filter.type),
    configPath: config.configPath,
  });

  const handleConnection = async (client: Socket): Promise<void> => {
    const peer = describePeer(client);
    logger.connection('accepted', peer);

    // Hold client bytes until the upstream connection exists.
    client.pause();
    const onEarlyError = (error: Error) => {
      logger.warn(`[Proxy] ${peer} failed before relaying`, { message: error.message });
      client.destroy();
    };
    client.once('error', onEarlyError);

    let upstream: Socket;
    try {
      upstream = await connectUpstream(network.serverHost, network.serverPort);
    } catch (error) {
      logger.error(`[Proxy] Cannot reach server ${network.serverHost}:${network.serverPort}`, error);
      logger.connection('failed', peer);
      client.off('error', onEarlyError);
      client.destroy();
      return;
    }

    if (client.destroyed) {
      upstream.destroy();
      logger.connection('failed', peer);
      return;
    }
    logger.connection('connected', `${network.serverHost}:${network.serverPort}`);

    const session = new ProxySession(client, upstream, filters, { classifier: options.classifier });
    sessions.add(session);
    const running = session.run();
    client.off('error', onEarlyError);
    client.resume();

    try {
      await running;
    } catch (error) {
      logger.error(`[Proxy] Session for ${peer} failed`, error);
    } finally {
      sessions.delete(session);
      logger.connection('closed', peer);
    }
  };

  // Half-open sockets let each direction finish on its own.
  const server = createServer({ allowHalfOpen: true }, (client) => {
    handleConnection(client).catch((error: unknown) => {
      logger.error('[Proxy] Connection handler error', error);
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(network.clientPort, network.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = (): AddressInfo => {
    const bound = server.address();
    if (bound === null || typeof bound === 'string') {
      throw new Error('Proxy is not listening on a TCP port');
    }
    return bound;
  };

  logger.info(`[Proxy] Listening on ${network.host}:${address().port}`);
  logger.info(`[Proxy] Forwarding to ${network.serverHost}:${network.serverPort}`);

  const shutdown = async () => {
    logger.info('[Proxy] Shutting down...');

    for (const session of sessions) {
      session.close();
    }

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    logger.info('[Proxy] Shutdown complete');
  };

  return {
    server,
    config,
    sessions,
    address,
    shutdown,
  };
}

// Main entry point when run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  createFaultProxy()
    .then((proxy) => {
      // Handle graceful shutdown
      const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

      for (const signal of signals) {
        process.on(signal, async () => {
          logger.info(`[Proxy] Received ${signal}`);
          await proxy.shutdown();
          process.exit(0);
        });
      }
    })
    .catch((error) => {
      logger.error('[Proxy] Failed to start', error);
      process.exit(1);
    });
}
