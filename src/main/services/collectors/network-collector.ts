import { z } from 'zod';
import type { AddressFamily, NetworkAddress, NetworkInfo } from '../../../shared/types/system';
import { CollectorError } from '../../../shared/types/errors';
import { createLogger } from '../logger';
import type { NetworkSource } from '../host/types';
import { OmissionTally } from './omission';

const log = createLogger('NetworkCollector');

const ZERO_MAC = '00:00:00:00:00:00';

/** Node < 18.4 reported family as a number */
const InterfaceEntrySchema = z.object({
  address: z.string().min(1),
  netmask: z.string().nullish(),
  family: z.union([z.literal('IPv4'), z.literal('IPv6'), z.literal(4), z.literal(6)]),
  mac: z.string().optional(),
});

type InterfaceEntry = z.infer<typeof InterfaceEntrySchema>;

function toFamily(family: InterfaceEntry['family']): AddressFamily {
  return family === 'IPv4' || family === 4 ? 'IPv4' : 'IPv6';
}

/**
 * Format a 48-bit node identifier as a MAC address: six lower-case hex
 * octets, most significant first.
 */
export function formatMacAddress(node: number): string {
  const octets: string[] = [];
  for (let shift = 5; shift >= 0; shift--) {
    const octet = Math.floor(node / 2 ** (8 * shift)) % 256;
    octets.push(octet.toString(16).padStart(2, '0'));
  }
  return octets.join(':');
}

export class NetworkCollector {
  constructor(private readonly source: NetworkSource) {}

  async collect(): Promise<NetworkInfo> {
    let hostname: string;
    let ipAddress: string;
    let macAddress: string;
    try {
      hostname = this.source.hostname();
      ipAddress = await this.source.resolveAddress(hostname);
      macAddress = formatMacAddress(this.source.nodeIdentifier());
    } catch (error) {
      throw CollectorError.wrap('network', error);
    }

    return { hostname, ipAddress, macAddress, interfaces: this.collectInterfaces() };
  }

  /** Malformed entries are skipped; an interface left with no entries is dropped */
  private collectInterfaces(): Record<string, NetworkAddress[]> {
    let table: Readonly<Record<string, ReadonlyArray<unknown> | undefined>>;
    try {
      table = this.source.interfaces();
    } catch (error) {
      throw CollectorError.wrap('network', error);
    }

    const interfaces: Record<string, NetworkAddress[]> = {};
    const skipped = new OmissionTally();

    for (const [name, entries] of Object.entries(table)) {
      if (!Array.isArray(entries)) {
        skipped.add('malformed');
        continue;
      }

      const addresses: NetworkAddress[] = [];
      let mac: string | undefined;
      for (const raw of entries) {
        const parsed = InterfaceEntrySchema.safeParse(raw);
        if (!parsed.success) {
          skipped.add('malformed');
          continue;
        }
        const entry = parsed.data;
        addresses.push({ address: entry.address, netmask: entry.netmask ?? null, family: toFamily(entry.family) });
        if (!mac && entry.mac && entry.mac !== ZERO_MAC) mac = entry.mac.toLowerCase();
      }

      if (mac) addresses.push({ address: mac, netmask: null, family: 'link' });
      if (addresses.length > 0) interfaces[name] = addresses;
    }

    skipped.report(log, 'interface entries');
    return interfaces;
  }
}
