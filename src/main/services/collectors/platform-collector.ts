import type { PlatformInfo } from '../../../shared/types/system';
import { CollectorError } from '../../../shared/types/errors';
import type { PlatformSource } from '../host/types';

/** Platform identity is re-read every cycle; any failure is fatal. */
export class PlatformCollector {
  constructor(private readonly source: PlatformSource) {}

  async collect(): Promise<PlatformInfo> {
    try {
      return this.source.identity();
    } catch (error) {
      throw CollectorError.wrap('platform', error);
    }
  }
}
