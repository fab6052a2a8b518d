export type DiscoveredEndpoint = {
  /** Stable device identifier (cast UUID). */
  id: string;
  name: string;
  model: string;
  host: string;
  port: number;
  isAudio: boolean;
};

export interface DiscoveryListener {
  onEndpointFound(endpoint: DiscoveredEndpoint): void;
  onEndpointLost(id: string): void;
}

export interface DiscoveryPort {
  start(listener: DiscoveryListener): void;
  stop(): Promise<void>;
}
