import type { ChannelRegistration } from '../types.js';

export interface ChannelSummary {
  clientName: string;
  machineName: string;
  channelUri: string;
  registeredAt: number;
  lastSeen: number;
}

export class ChannelRegistry {
  private readonly channels = new Map<string, ChannelRegistration>();

  register(clientName: string, channelUri: string, machineName: string, registeredAt: number, now: number): ChannelRegistration {
    const next: ChannelRegistration = { clientName, channelUri, machineName, registeredAt, lastSeen: now };
    this.channels.set(clientName, next);
    return next;
  }

  touch(clientName: string, now: number): void {
    const c = this.channels.get(clientName);
    if (c) c.lastSeen = now;
  }

  unregister(clientName: string): boolean {
    return this.channels.delete(clientName);
  }

  get(clientName: string): ChannelRegistration | undefined { return this.channels.get(clientName); }
  list(): ChannelRegistration[] { return [...this.channels.values()]; }
  size(): number { return this.channels.size; }

  summarize(): ChannelSummary[] {
    return this.list().map((c) => ({
      clientName: c.clientName,
      machineName: c.machineName,
      channelUri: c.channelUri.length > 40 ? `${c.channelUri.slice(0, 40)}...` : c.channelUri,
      registeredAt: c.registeredAt,
      lastSeen: c.lastSeen
    }));
  }
}
