import os from 'os';
import * as si from 'systeminformation';
import {
  DiskUsage,
  LoadAverage,
  MemoryUsage,
  NetworkAddress,
  NetworkTraffic,
  Session,
  SystemSource,
  Temperature,
} from './types';

export type FsEntry = {
  fs: string;
  type: string;
  size: number;
  used: number;
  mount: string;
};

export type InterfaceEntry = {
  iface: string;
  ip4: string;
  internal: boolean;
  operstate: string;
  speed: number | null;
};

export type TrafficEntry = {
  iface: string;
  rx_bytes: number;
  tx_bytes: number;
};

export type TemperatureReading = {
  main: number | null;
  cores: (number | null)[];
  chipset?: number | null;
};

export type UserEntry = {
  user: string;
  tty: string;
  date: string;
  time: string;
  ip: string;
};

const isLoopback = (iface: string) => iface.startsWith('lo');

export function selectDisks(entries: FsEntry[]): DiskUsage[] {
  const seen = new Set<string>();
  const disks: DiskUsage[] = [];
  for (const entry of entries) {
    if (entry.mount.includes('loop') || entry.fs.includes('loop')) continue;
    if (!entry.type) continue;
    if (entry.size <= 0) continue;
    if (seen.has(entry.mount)) continue;
    seen.add(entry.mount);
    disks.push({ mount: entry.mount, device: entry.fs, total: entry.size, used: entry.used });
  }
  return disks;
}

export function selectAddresses(entries: InterfaceEntry[]): NetworkAddress[] {
  const addresses: NetworkAddress[] = [];
  for (const entry of entries) {
    if (isLoopback(entry.iface) || entry.internal || !entry.ip4) continue;
    if (entry.operstate !== 'up') continue;
    const speedMbps = entry.speed !== null && entry.speed > 0 ? entry.speed : undefined;
    addresses.push({ iface: entry.iface, address: entry.ip4, speedMbps });
  }
  return addresses;
}

export function selectTraffic(entries: TrafficEntry[]): NetworkTraffic[] {
  return entries
    .filter((entry) => !isLoopback(entry.iface))
    .filter((entry) => entry.tx_bytes > 0 || entry.rx_bytes > 0)
    .map((entry) => ({ iface: entry.iface, sent: entry.tx_bytes, received: entry.rx_bytes }));
}

const validReading = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

export function selectTemperatures(reading: TemperatureReading): Temperature[] {
  const sensors: Temperature[] = [];
  if (validReading(reading.main)) sensors.push({ sensor: 'cpu', celsius: reading.main });
  reading.cores.forEach((value, index) => {
    if (validReading(value)) sensors.push({ sensor: `core ${index}`, celsius: value });
  });
  if (validReading(reading.chipset)) sensors.push({ sensor: 'chipset', celsius: reading.chipset });
  return sensors;
}

export function selectSessions(entries: UserEntry[], now: number): Session[] {
  return entries.map((entry) => {
    const started = Date.parse(`${entry.date}T${entry.time}`);
    const seconds = Number.isNaN(started) ? undefined : Math.max(0, Math.floor((now - started) / 1000));
    return {
      user: entry.user,
      terminal: entry.tty || 'console',
      host: entry.ip || undefined,
      seconds,
    };
  });
}

/** Reads the live machine through node's os module and systeminformation. */
export class NodeSystemSource implements SystemSource {
  private memData?: Promise<si.Systeminformation.MemData>;

  hostname(): string {
    return os.hostname();
  }

  user(): string {
    return os.userInfo().username;
  }

  async osName(): Promise<string> {
    const info = await si.osInfo();
    const name = [info.distro, info.release].filter(Boolean).join(' ').trim();
    return name || os.type();
  }

  kernel(): string {
    return os.release();
  }

  arch(): string {
    return os.arch();
  }

  uptimeSeconds(): number {
    return Math.floor(os.uptime());
  }

  async memory(): Promise<MemoryUsage> {
    const mem = await this.readMem();
    return { total: mem.total, used: mem.total - mem.available };
  }

  async swap(): Promise<MemoryUsage> {
    const mem = await this.readMem();
    return { total: mem.swaptotal, used: mem.swapused };
  }

  cpuModel(): string {
    const [first] = os.cpus();
    if (!first) throw new Error('no CPU entries reported');
    return first.model.trim();
  }

  cpuCores(): number {
    return os.availableParallelism();
  }

  loadAverage(): LoadAverage {
    if (os.platform() === 'win32') {
      throw new Error('load average is not reported on Windows');
    }
    const [one, five, fifteen] = os.loadavg();
    return [one ?? 0, five ?? 0, fifteen ?? 0];
  }

  async cpuUsage(): Promise<number[]> {
    const load = await si.currentLoad();
    return load.cpus.map((core) => Math.min(100, Math.max(0, core.load)));
  }

  async disks(): Promise<DiskUsage[]> {
    return selectDisks(await si.fsSize());
  }

  async addresses(): Promise<NetworkAddress[]> {
    const data = await si.networkInterfaces();
    return selectAddresses(Array.isArray(data) ? data : [data]);
  }

  async traffic(): Promise<NetworkTraffic[]> {
    return selectTraffic(await si.networkStats('*'));
  }

  async temperatures(): Promise<Temperature[]> {
    return selectTemperatures(await si.cpuTemperature());
  }

  async sessions(): Promise<Session[]> {
    return selectSessions(await si.users(), Date.now());
  }

  // memory and swap come from the same call
  private readMem(): Promise<si.Systeminformation.MemData> {
    if (!this.memData) this.memData = si.mem();
    return this.memData;
  }
}
