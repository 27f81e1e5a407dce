import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import { randomUUID } from 'node:crypto';
import { networkInterfaces } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Logger } from '../logger.js';
import type { SenderInfo } from '../protocol/messages.js';
import { errorMessage } from '../utils.js';
import type { NetworkDriver, PeerDescriptor, ReceiveHandler, SendOptions, SendResult } from './driver.js';
import { FrameCodec, type FrameCodecOptions } from './frame.js';

export interface LanNetworkDriverOptions extends FrameCodecOptions {
  nodeId: string;
  /** WebSocket port for frames; 0 picks a free port */
  port: number;
  /** UDP port for discovery probes */
  broadcastPort: number;
  /** Seconds allowed for opening a link to a peer */
  connectionTimeout: number;
  /** Tags advertised in probe replies */
  capabilities: string[];
  /** Bind to this interface's IPv4 address */
  networkInterface?: string;
  /** Where probes are sent; derived from the interface when omitted */
  broadcastAddress?: string;
  logger?: Logger;
}

interface ProbeDatagram {
  kind: 'probe';
  requestId: string;
  nodeId: string;
  port: number;
}

interface ProbeReplyDatagram {
  kind: 'probe_reply';
  requestId: string;
  nodeId: string;
  port: number;
  capabilities: string[];
}

type Datagram = ProbeDatagram | ProbeReplyDatagram;

interface Link {
  url: string;
  socket: WebSocket;
}

/**
 * Compute the directed broadcast address of an IPv4 subnet.
 *
 * @example broadcastAddressFor('192.168.1.23', '255.255.255.0') === '192.168.1.255'
 */
export function broadcastAddressFor(address: string, netmask: string): string {
  const addr = address.split('.').map(Number);
  const mask = netmask.split('.').map(Number);
  return addr.map((octet, i) => (octet | (~(mask[i] ?? 0) & 0xff)) & 0xff).join('.');
}

/**
 * Find the IPv4 address and netmask of a named interface.
 * @throws If the interface does not exist or has no IPv4 address
 */
export function resolveInterface(name: string): { address: string; netmask: string } {
  const entries = networkInterfaces()[name];
  const ipv4 = entries?.find(entry => entry.family === 'IPv4');
  if (!ipv4) {
    throw new Error(`Network interface not found or has no IPv4 address: ${name}`);
  }
  return { address: ipv4.address, netmask: ipv4.netmask };
}

function normalizeAddress(address: string | undefined): string {
  if (!address) return '';
  return address.startsWith('::ffff:') ? address.slice(7) : address;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function parseDatagram(msg: Buffer): Datagram | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(msg.toString('utf-8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;
  const d: Record<string, unknown> = { ...parsed };
  if (typeof d.requestId !== 'string' || typeof d.nodeId !== 'string' || typeof d.port !== 'number') {
    return null;
  }
  if (d.kind === 'probe') {
    return { kind: 'probe', requestId: d.requestId, nodeId: d.nodeId, port: d.port };
  }
  if (d.kind === 'probe_reply') {
    const capabilities = Array.isArray(d.capabilities)
      ? d.capabilities.filter((cap): cap is string => typeof cap === 'string')
      : [];
    return { kind: 'probe_reply', requestId: d.requestId, nodeId: d.nodeId, port: d.port, capabilities };
  }
  return null;
}

/**
 * Local-network driver: UDP broadcast probes find nodes, WebSocket links
 * carry frames between them.
 */
export class LanNetworkDriver implements NetworkDriver {
  private options: LanNetworkDriverOptions;
  private logger: Logger | null;
  private codec: FrameCodec;
  private udp: Socket | null = null;
  private wss: WebSocketServer | null = null;
  private links = new Map<string, Link>();
  private addressBook = new Map<string, { address: string; port: number }>();
  private pending = new Map<string, Map<string, PeerDescriptor>>();
  private receiveHandler: ReceiveHandler | null = null;
  private bindAddress = '0.0.0.0';
  private broadcastAddress = '255.255.255.255';
  private listeningPort = 0;
  private lifetime = new AbortController();

  /**
   * @throws When the signing key cannot be parsed
   */
  constructor(options: LanNetworkDriverOptions) {
    this.options = options;
    this.logger = options.logger ?? null;
    this.codec = new FrameCodec(options);
  }

  /**
   * Bind the WebSocket server and the UDP discovery socket.
   */
  async start(): Promise<void> {
    if (this.wss) {
      return;
    }
    this.lifetime = new AbortController();

    if (this.options.networkInterface) {
      const iface = resolveInterface(this.options.networkInterface);
      this.bindAddress = iface.address;
      this.broadcastAddress = broadcastAddressFor(iface.address, iface.netmask);
    }
    if (this.options.broadcastAddress) {
      this.broadcastAddress = this.options.broadcastAddress;
    }

    try {
      await this.startServer();
      await this.startDiscoverySocket();
    } catch (err) {
      await this.close();
      throw err;
    }
  }

  /**
   * Port the WebSocket server actually listens on.
   */
  port(): number {
    return this.listeningPort;
  }

  onReceive(handler: ReceiveHandler): void {
    this.receiveHandler = handler;
  }

  /**
   * Record where a node can be reached. Discovery and inbound traffic call
   * this; hosts may also seed known peers with it.
   */
  learnAddress(nodeId: string, address: string, port: number): void {
    if (nodeId === this.options.nodeId) return;
    this.addressBook.set(nodeId, { address, port });
  }

  /**
   * Broadcast a probe and gather replies for timeoutSeconds.
   */
  async discover(timeoutSeconds: number): Promise<PeerDescriptor[]> {
    const udp = this.udp;
    if (!udp) {
      throw new Error('Driver not started');
    }

    const requestId = randomUUID();
    const replies = new Map<string, PeerDescriptor>();
    this.pending.set(requestId, replies);

    try {
      const probe: ProbeDatagram = {
        kind: 'probe',
        requestId,
        nodeId: this.options.nodeId,
        port: this.listeningPort,
      };
      await this.sendDatagram(udp, probe, this.options.broadcastPort, this.broadcastAddress);
      await delay(timeoutSeconds * 1000, undefined, { signal: this.lifetime.signal }).catch((err: unknown) => {
        if (!this.lifetime.signal.aborted) throw err;
      });
      return Array.from(replies.values());
    } finally {
      this.pending.delete(requestId);
    }
  }

  /**
   * Frame and deliver data to a node over its WebSocket link.
   */
  async sendTo(nodeId: string, data: string, options: SendOptions): Promise<SendResult> {
    const target = this.addressBook.get(nodeId);
    if (!target) {
      return { ok: false, error: `Unknown node: ${nodeId}` };
    }

    const encoded = this.codec.encode({
      type: options.type,
      sender: this.options.nodeId,
      port: this.listeningPort,
      ...(options.messageClass !== undefined ? { messageClass: options.messageClass } : {}),
      body: data,
      encrypt: options.encrypt,
    });
    if (!encoded.ok) {
      return { ok: false, error: encoded.error };
    }

    try {
      const socket = await this.link(nodeId, target.address, target.port);
      await new Promise<void>((resolve, reject) => {
        socket.send(encoded.data, (err) => (err ? reject(err) : resolve()));
      });
      return { ok: true };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  /**
   * Close every socket. Safe to call more than once.
   */
  async close(): Promise<void> {
    this.lifetime.abort();
    for (const link of this.links.values()) {
      link.socket.close();
    }
    this.links.clear();
    this.pending.clear();
    this.addressBook.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    const udp = this.udp;
    this.udp = null;
    if (udp) {
      await new Promise<void>((resolve) => udp.close(() => resolve()));
    }
  }

  private startServer(): Promise<void> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.options.port,
        host: this.bindAddress,
        maxPayload: this.options.maxMessageSize,
      });
      this.wss = wss;

      const onStartupError = (error: Error): void => reject(error);
      wss.once('error', onStartupError);

      wss.on('listening', () => {
        wss.off('error', onStartupError);
        wss.on('error', (error) => {
          this.logger?.error(`WebSocket server error: ${error.message}`);
        });
        const address = wss.address();
        this.listeningPort = typeof address === 'string' ? this.options.port : address.port;
        resolve();
      });

      wss.on('connection', (socket, req) => {
        const remote = normalizeAddress(req.socket.remoteAddress);
        socket.on('message', (data: RawData) => {
          this.handleFrame(toBuffer(data), remote);
        });
        socket.on('error', (error) => {
          this.logger?.debug(`Inbound link error from ${remote}: ${error.message}`);
        });
      });
    });
  }

  private startDiscoverySocket(): Promise<void> {
    return new Promise((resolve, reject) => {
      const udp = createSocket({ type: 'udp4', reuseAddr: true });
      this.udp = udp;

      const onStartupError = (error: Error): void => reject(error);
      udp.once('error', onStartupError);

      udp.on('message', (msg, rinfo) => this.handleDatagram(msg, rinfo));

      udp.bind(this.options.broadcastPort, () => {
        udp.off('error', onStartupError);
        udp.on('error', (error) => {
          this.logger?.error(`Discovery socket error: ${error.message}`);
        });
        udp.setBroadcast(true);
        resolve();
      });
    });
  }

  private sendDatagram(udp: Socket, datagram: Datagram, port: number, address: string): Promise<void> {
    const payload = Buffer.from(JSON.stringify(datagram));
    return new Promise((resolve, reject) => {
      udp.send(payload, port, address, (err) => (err ? reject(err) : resolve()));
    });
  }

  private handleDatagram(msg: Buffer, rinfo: RemoteInfo): void {
    const datagram = parseDatagram(msg);
    if (!datagram || datagram.nodeId === this.options.nodeId) {
      return;
    }

    this.learnAddress(datagram.nodeId, rinfo.address, datagram.port);

    if (datagram.kind === 'probe') {
      const udp = this.udp;
      if (!udp) return;
      const reply: ProbeReplyDatagram = {
        kind: 'probe_reply',
        requestId: datagram.requestId,
        nodeId: this.options.nodeId,
        port: this.listeningPort,
        capabilities: this.options.capabilities,
      };
      this.sendDatagram(udp, reply, rinfo.port, rinfo.address).catch((err: unknown) => {
        this.logger?.debug(`Probe reply to ${rinfo.address} failed: ${errorMessage(err)}`);
      });
      return;
    }

    this.pending.get(datagram.requestId)?.set(datagram.nodeId, {
      nodeId: datagram.nodeId,
      address: rinfo.address,
      port: datagram.port,
      capabilities: datagram.capabilities,
    });
  }

  private handleFrame(raw: Buffer, remoteAddress: string): void {
    const decoded = this.codec.decode(raw);
    if (!decoded.ok) {
      this.logger?.debug(`Dropping frame from ${remoteAddress}: ${decoded.reason}`);
      return;
    }

    const { frame, body } = decoded;
    if (frame.sender === this.options.nodeId) {
      return;
    }
    if (remoteAddress) {
      this.learnAddress(frame.sender, remoteAddress, frame.port);
    }

    let message: unknown;
    if (frame.type === 'heartbeat') {
      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch {
        this.logger?.debug(`Dropping heartbeat from ${frame.sender}: invalid_json`);
        return;
      }
      message = typeof parsed === 'object' && parsed !== null ? { ...parsed, type: 'heartbeat' } : parsed;
    } else {
      message = { type: frame.type, message_class: frame.messageClass, payload: body };
    }

    const sender: SenderInfo = { address: remoteAddress, port: frame.port, nodeId: frame.sender };
    try {
      this.receiveHandler?.(message, sender);
    } catch (err) {
      this.logger?.error(`Receive handler failed: ${errorMessage(err)}`);
    }
  }

  private async link(nodeId: string, address: string, port: number): Promise<WebSocket> {
    const host = address.includes(':') ? `[${address}]` : address;
    const url = `ws://${host}:${port}`;

    const existing = this.links.get(nodeId);
    if (existing && existing.url === url && existing.socket.readyState === WebSocket.OPEN) {
      return existing.socket;
    }
    if (existing) {
      existing.socket.close();
      this.links.delete(nodeId);
    }

    const socket = new WebSocket(url, { handshakeTimeout: this.options.connectionTimeout * 1000 });
    socket.on('error', (error) => {
      this.logger?.debug(`Link to ${nodeId} failed: ${error.message}`);
    });
    await new Promise<void>((resolve, reject) => {
      socket.once('open', () => resolve());
      socket.once('error', reject);
    });

    socket.on('close', () => {
      if (this.links.get(nodeId)?.socket === socket) {
        this.links.delete(nodeId);
      }
    });
    this.links.set(nodeId, { url, socket });
    return socket;
  }
}
