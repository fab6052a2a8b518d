import type { DiscoveredEndpoint, DiscoveryListener } from '@/ports/DiscoveryPort';
import type { TargetPort } from '@/ports/TargetPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type Logger } from '@/shared/logging/logger';

export type TargetFactory = (endpoint: DiscoveredEndpoint) => TargetPort;

export type TargetSummary = {
  id: string;
  name: string;
  model: string;
  ready: boolean;
};

/**
 * Read access the worker needs.
 */
export interface TargetLookup {
  findByName(name: string): TargetPort | undefined;
}

/**
 * Owns the known targets, keyed by stable device id. Fed by discovery.
 */
export class TargetRegistry implements TargetLookup, DiscoveryListener {
  private readonly targets = new Map<string, TargetPort>();

  constructor(
    private readonly createTarget: TargetFactory,
    private readonly options: { audioOnly: boolean } = { audioOnly: true },
    private readonly log: Logger = createLogger('Cast', 'Registry'),
  ) {}

  public onEndpointFound(endpoint: DiscoveredEndpoint): void {
    if (this.options.audioOnly && !endpoint.isAudio) {
      this.log.debug('ignoring non-audio device', { name: endpoint.name, model: endpoint.model });
      return;
    }
    const existing = this.targets.get(endpoint.id);
    if (existing) {
      this.log.debug('replacing known target', { id: endpoint.id, name: endpoint.name });
      this.release(existing);
    } else {
      this.log.info('target added', { id: endpoint.id, name: endpoint.name, model: endpoint.model });
    }
    this.targets.set(endpoint.id, this.createTarget(endpoint));
  }

  public onEndpointLost(id: string): void {
    const existing = this.targets.get(id);
    if (!existing) {
      return;
    }
    this.targets.delete(id);
    this.log.info('target removed', { id, name: existing.name });
    this.release(existing);
  }

  public add(target: TargetPort): void {
    const existing = this.targets.get(target.id);
    if (existing && existing !== target) {
      this.release(existing);
    }
    this.targets.set(target.id, target);
  }

  public get(id: string): TargetPort | undefined {
    return this.targets.get(id);
  }

  public findByName(name: string): TargetPort | undefined {
    for (const target of this.targets.values()) {
      if (target.name === name) {
        return target;
      }
    }
    return undefined;
  }

  public list(): TargetSummary[] {
    return [...this.targets.values()]
      .map((target) => ({
        id: target.id,
        name: target.name,
        model: target.model,
        ready: target.isReady(),
      }))
      .sort((left, right) => left.name.localeCompare(right.name));
  }

  public async disposeAll(): Promise<void> {
    const targets = [...this.targets.values()];
    this.targets.clear();
    await Promise.all(targets.map((target) => this.dispose(target)));
  }

  private release(target: TargetPort): void {
    void this.dispose(target);
  }

  private dispose(target: TargetPort): Promise<void> {
    return bestEffort(() => target.dispose(), {
      fallback: undefined,
      onError: 'warn',
      label: 'failed to disconnect target',
      context: { name: target.name },
      log: this.log,
    });
  }
}
