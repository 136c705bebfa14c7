import * as os from 'os';
import { randomBytes } from 'crypto';
import { promises as dns } from 'dns';
import type { NetworkSource } from './types';

const ZERO_MAC = '00:00:00:00:00:00';

export function macToNodeIdentifier(mac: string): number {
  return parseInt(mac.replace(/[:-]/g, ''), 16);
}

export class OsNetworkSource implements NetworkSource {
  /** Random fallback is drawn once so the MAC stays stable across cycles */
  private fallbackNode: number | null = null;

  hostname(): string {
    return os.hostname();
  }

  async resolveAddress(hostname: string): Promise<string> {
    const { address } = await dns.lookup(hostname, { family: 4 });
    return address;
  }

  /**
   * MAC of the first external interface. Without one, a random 48-bit value
   * with the multicast bit set, as RFC 4122 prescribes for generated nodes.
   */
  nodeIdentifier(): number {
    for (const addrs of Object.values(os.networkInterfaces())) {
      const external = addrs?.find((addr) => !addr.internal && addr.mac && addr.mac !== ZERO_MAC);
      if (external) return macToNodeIdentifier(external.mac);
    }

    if (this.fallbackNode === null) {
      const bytes = randomBytes(6);
      bytes[0] |= 0x01;
      this.fallbackNode = bytes.readUIntBE(0, 6);
    }
    return this.fallbackNode;
  }

  interfaces(): Readonly<Record<string, ReadonlyArray<unknown> | undefined>> {
    return os.networkInterfaces();
  }
}
