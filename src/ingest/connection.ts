export type LocationResolution = {
  locationId: string;
  /** A packet named a location other than the one already bound. */
  conflict: string | null;
  source: 'bound' | 'packet' | 'ip-map' | 'peer';
};

/**
 * Per-socket state. The location binding is set once, by the first location
 * the peer names, and never changes afterwards.
 */
export class ConnectionContext {
  readonly id: number;
  readonly remoteAddress: string;
  readonly remotePort: number;
  readonly connectedAt: number;
  serial: string | null = null;
  packets = 0;
  errors = 0;
  bytes = 0;
  private boundLocation: string | null = null;
  private readonly fallbackLocation: string;
  private readonly fallbackSource: 'ip-map' | 'peer';

  constructor(options: {
    id: number;
    remoteAddress: string;
    remotePort: number;
    connectedAt: number;
    ipLocationMap?: Readonly<Record<string, string>>;
  }) {
    this.id = options.id;
    this.remoteAddress = normalizeAddress(options.remoteAddress);
    this.remotePort = options.remotePort;
    this.connectedAt = options.connectedAt;
    const mapped = options.ipLocationMap?.[this.remoteAddress];
    this.fallbackLocation = mapped ?? this.remoteAddress;
    this.fallbackSource = mapped ? 'ip-map' : 'peer';
  }

  get locationId(): string | null {
    return this.boundLocation;
  }

  get peer(): string {
    return `${this.remoteAddress}:${this.remotePort}`;
  }

  /** Resolves the key for a packet, binding the connection on first sight of a location. */
  resolve(packetLocation: string | null): LocationResolution {
    if (this.boundLocation !== null) {
      const conflict = packetLocation !== null && packetLocation !== this.boundLocation ? packetLocation : null;
      return { locationId: this.boundLocation, conflict, source: 'bound' };
    }
    if (packetLocation !== null) {
      this.boundLocation = packetLocation;
      return { locationId: packetLocation, conflict: null, source: 'packet' };
    }
    return { locationId: this.fallbackLocation, conflict: null, source: this.fallbackSource };
  }

  /** Location used to attribute a packet without binding anything. */
  attribute(packetLocation: string | null): string {
    return this.boundLocation ?? packetLocation ?? this.fallbackLocation;
  }
}

export function normalizeAddress(address: string): string {
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}
