/**
 * In-process TCP endpoints for proxy tests
 */

import { connect, createServer, type Server, type Socket } from 'net';

/**
 * Stand-in transfer server: records what it receives and can reply.
 */
export class TestUpstream {
  readonly received: Buffer[] = [];
  /** Connections accepted so far, open or not */
  acceptedCount = 0;
  /** Connections whose peer has half-closed */
  endedCount = 0;
  private readonly server: Server;
  private readonly sockets = new Set<Socket>();

  private constructor(server: Server) {
    this.server = server;
    server.on('connection', (socket) => {
      this.acceptedCount++;
      this.sockets.add(socket);
      socket.on('data', (data) => this.received.push(data));
      socket.on('end', () => this.endedCount++);
      socket.on('error', () => socket.destroy());
      socket.on('close', () => this.sockets.delete(socket));
    });
  }

  static async start(): Promise<TestUpstream> {
    const server = createServer({ allowHalfOpen: true });
    const upstream = new TestUpstream(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    return upstream;
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Upstream is not listening');
    }
    return address.port;
  }

  get bytes(): Buffer {
    return Buffer.concat(this.received);
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  /** Write to every connected client */
  write(data: Uint8Array): void {
    for (const socket of this.sockets) {
      socket.write(data);
    }
  }

  /** Half-close every connection */
  end(): void {
    for (const socket of this.sockets) {
      socket.end();
    }
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}

/**
 * Client socket that records everything it reads
 */
export async function connectClient(port: number): Promise<{ socket: Socket; received: Buffer[] }> {
  const socket = connect({ host: '127.0.0.1', port });
  const received: Buffer[] = [];
  socket.on('data', (data: Buffer) => received.push(data));
  await new Promise<void>((resolve, reject) => {
    socket.once('connect', () => resolve());
    socket.once('error', reject);
  });
  return { socket, received };
}

/**
 * Poll until `condition` holds or `timeoutMs` passes
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

