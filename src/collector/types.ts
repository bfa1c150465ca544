export type Fact<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: string };

export const present = <T>(value: T): Fact<T> => ({ ok: true, value });

export const absent = <T = never>(reason: string): Fact<T> => ({ ok: false, reason });

export function factValue<T>(fact: Fact<T>): T | undefined {
  return fact.ok ? fact.value : undefined;
}

export type MemoryUsage = Readonly<{
  total: number;
  used: number;
}>;

export type DiskUsage = MemoryUsage &
  Readonly<{
    mount: string;
    device: string;
  }>;

export type NetworkAddress = Readonly<{
  iface: string;
  address: string;
  /** Link speed when the driver reports one. */
  speedMbps?: number;
}>;

export type NetworkTraffic = Readonly<{
  iface: string;
  sent: number;
  received: number;
}>;

export type Temperature = Readonly<{
  sensor: string;
  celsius: number;
}>;

export type Session = Readonly<{
  user: string;
  terminal: string;
  host?: string;
  /** How long the session has been open when the snapshot was taken. */
  seconds?: number;
}>;

export type LoadAverage = readonly [number, number, number];

export type SystemSnapshot = Readonly<{
  hostname: Fact<string>;
  user: Fact<string>;
  osName: Fact<string>;
  kernel: Fact<string>;
  arch: Fact<string>;
  uptimeSeconds: Fact<number>;
  memory: Fact<MemoryUsage>;
  swap: Fact<MemoryUsage>;
  cpuModel: Fact<string>;
  cpuCores: Fact<number>;
  loadAverage: Fact<LoadAverage>;
  cpuUsage: Fact<readonly number[]>;
  disks: Fact<readonly DiskUsage[]>;
  addresses: Fact<readonly NetworkAddress[]>;
  traffic: Fact<readonly NetworkTraffic[]>;
  temperatures: Fact<readonly Temperature[]>;
  sessions: Fact<readonly Session[]>;
}>;

export type FactName = keyof SystemSnapshot;

export const FACT_NAMES = [
  'hostname',
  'user',
  'osName',
  'kernel',
  'arch',
  'uptimeSeconds',
  'memory',
  'swap',
  'cpuModel',
  'cpuCores',
  'loadAverage',
  'cpuUsage',
  'disks',
  'addresses',
  'traffic',
  'temperatures',
  'sessions',
] as const satisfies readonly FactName[];

type Sourced<T> = T | Promise<T>;

/**
 * Where the collector reads the live system from. Every method is queried
 * independently; a throw or rejection only costs that one fact.
 */
export interface SystemSource {
  hostname(): Sourced<string>;
  user(): Sourced<string>;
  osName(): Sourced<string>;
  kernel(): Sourced<string>;
  arch(): Sourced<string>;
  uptimeSeconds(): Sourced<number>;
  memory(): Sourced<MemoryUsage>;
  swap(): Sourced<MemoryUsage>;
  cpuModel(): Sourced<string>;
  cpuCores(): Sourced<number>;
  loadAverage(): Sourced<LoadAverage>;
  /** Busy percentage per logical core, 0-100. */
  cpuUsage(): Sourced<readonly number[]>;
  disks(): Sourced<readonly DiskUsage[]>;
  addresses(): Sourced<readonly NetworkAddress[]>;
  traffic(): Sourced<readonly NetworkTraffic[]>;
  temperatures(): Sourced<readonly Temperature[]>;
  sessions(): Sourced<readonly Session[]>;
}
