import Bonjour from 'bonjour-service';
import type { DiscoveredEndpoint, DiscoveryListener, DiscoveryPort } from '@/ports/DiscoveryPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const log = createLogger('Cast', 'Discovery');

type Browser = ReturnType<Bonjour['find']>;

/** Models treated as speakers; matched as lowercase substrings. */
export const AUDIO_MODELS = [
  'Google Home',
  'Google Home Mini',
  'Google Nest Mini',
  'Google Nest Hub',
  'Google Nest Audio',
  'Nest Audio',
  'Home Mini',
  'Google Cast Group',
  'Lenovo Smart Clock',
];

export type CastServiceRecord = {
  name?: string;
  host?: string;
  port?: number;
  addresses?: string[];
  txt?: Record<string, unknown>;
};

export function isAudioModel(model: string | undefined): boolean {
  if (!model) {
    return false;
  }
  const lower = model.toLowerCase();
  return AUDIO_MODELS.some((candidate) => lower.includes(candidate.toLowerCase()));
}

function txtValue(txt: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = txt?.[key];
  if (typeof value === 'string' && value.trim()) {
    return value.trim();
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8').trim() || undefined;
  }
  return undefined;
}

/**
 * Maps a `_googlecast._tcp` announcement to an endpoint. Records without a
 * device id or a reachable address are dropped.
 */
export function toEndpoint(service: CastServiceRecord): DiscoveredEndpoint | null {
  const id = txtValue(service.txt, 'id');
  const addresses = service.addresses ?? [];
  const host =
    addresses.find((address) => address.includes('.')) ??
    addresses[0] ??
    service.host?.replace(/\.$/, '');
  if (!id || !host) {
    return null;
  }
  const model = txtValue(service.txt, 'md') ?? '';
  const port = typeof service.port === 'number' && service.port > 0 ? service.port : 8009;
  return {
    id,
    name: txtValue(service.txt, 'fn') ?? service.name ?? host,
    model,
    host,
    port,
    isAudio: isAudioModel(model),
  };
}

/**
 * Continuous mDNS browse for cast devices.
 */
export class CastDiscovery implements DiscoveryPort {
  private bonjour: Bonjour | null = null;
  private browser: Browser | null = null;
  private readonly idsByName = new Map<string, string>();

  public start(listener: DiscoveryListener): void {
    if (this.bonjour) {
      return;
    }
    const bonjour = new Bonjour();
    const browser = bonjour.find({ type: 'googlecast', protocol: 'tcp' });
    browser.on('up', (service: CastServiceRecord) => {
      const endpoint = toEndpoint(service);
      if (!endpoint) {
        log.debug('ignoring incomplete cast announcement', { name: service.name });
        return;
      }
      if (service.name) {
        this.idsByName.set(service.name, endpoint.id);
      }
      log.debug('cast device seen', { ...endpoint });
      listener.onEndpointFound(endpoint);
    });
    browser.on('down', (service: CastServiceRecord) => {
      const id = txtValue(service.txt, 'id') ?? (service.name ? this.idsByName.get(service.name) : undefined);
      if (id) {
        listener.onEndpointLost(id);
      }
    });
    browser.start();
    this.bonjour = bonjour;
    this.browser = browser;
    log.info('zeroconf discovery started');
  }

  public async stop(): Promise<void> {
    const { bonjour, browser } = this;
    this.bonjour = null;
    this.browser = null;
    if (browser) {
      bestEffortSync(() => browser.stop(), {
        fallback: undefined,
        onError: 'debug',
        label: 'mdns browse stop failed',
        log,
      });
    }
    if (bonjour) {
      bestEffortSync(() => bonjour.destroy(), {
        fallback: undefined,
        onError: 'debug',
        label: 'mdns shutdown failed',
        log,
      });
      log.info('zeroconf discovery stopped');
    }
  }
}
