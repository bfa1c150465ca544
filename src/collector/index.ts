import { z } from 'zod';
import { logger } from '../telemetry';
import { NodeSystemSource } from './source';
import { absent, Fact, FactName, present, SystemSnapshot, SystemSource } from './types';

export * from './types';
export {
  NodeSystemSource,
  selectAddresses,
  selectDisks,
  selectSessions,
  selectTemperatures,
  selectTraffic,
} from './source';

const text = z.string().trim().min(1);
const bytes = z.number().finite().nonnegative();
const usage = z
  .object({ total: bytes, used: bytes })
  .refine((value) => value.used <= value.total, 'used exceeds total');

const factSchemas = {
  hostname: text,
  user: text,
  osName: text,
  kernel: text,
  arch: text,
  uptimeSeconds: z.number().int().nonnegative(),
  memory: usage,
  swap: usage,
  cpuModel: text,
  cpuCores: z.number().int().positive(),
  loadAverage: z.tuple([bytes, bytes, bytes]),
  disks: z
    .array(
      z
        .object({ mount: text, device: z.string(), total: bytes, used: bytes })
        .refine((disk) => disk.used <= disk.total, 'used exceeds total'),
    )
    .min(1),
  cpuUsage: z.array(z.number().min(0).max(100)).min(1),
  addresses: z
    .array(z.object({ iface: text, address: text, speedMbps: z.number().positive().optional() }))
    .min(1),
  traffic: z.array(z.object({ iface: text, sent: bytes, received: bytes })).min(1),
  temperatures: z.array(z.object({ sensor: text, celsius: z.number().finite() })).min(1),
  sessions: z.array(
    z.object({
      user: text,
      terminal: text,
      host: z.string().min(1).optional(),
      seconds: z.number().int().nonnegative().optional(),
    }),
  ),
} satisfies Record<FactName, z.ZodTypeAny>;

/** Freezes a value and everything reachable from it. */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function describeFailure(err: unknown): string {
  if (err instanceof z.ZodError) {
    return err.issues.map((issue) => issue.message).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Reads one fact. Whatever goes wrong (a throw, a rejection, a value that
 * fails its schema) becomes an absent fact.
 */
export async function readFact<S extends z.ZodTypeAny>(
  name: FactName,
  read: () => unknown,
  schema: S,
): Promise<Fact<z.infer<S>>> {
  try {
    const value: z.infer<S> = schema.parse(await read());
    return present(value);
  } catch (err) {
    const reason = describeFailure(err);
    logger.debug({ fact: name, reason }, 'fact unavailable');
    return absent(reason);
  }
}

export async function collect(source: SystemSource = new NodeSystemSource()): Promise<SystemSnapshot> {
  const started = Date.now();
  const [
    hostname,
    user,
    osName,
    kernel,
    arch,
    uptimeSeconds,
    memory,
    swap,
    cpuModel,
    cpuCores,
    loadAverage,
    cpuUsage,
    disks,
    addresses,
    traffic,
    temperatures,
    sessions,
  ] = await Promise.all([
    readFact('hostname', () => source.hostname(), factSchemas.hostname),
    readFact('user', () => source.user(), factSchemas.user),
    readFact('osName', () => source.osName(), factSchemas.osName),
    readFact('kernel', () => source.kernel(), factSchemas.kernel),
    readFact('arch', () => source.arch(), factSchemas.arch),
    readFact('uptimeSeconds', () => source.uptimeSeconds(), factSchemas.uptimeSeconds),
    readFact('memory', () => source.memory(), factSchemas.memory),
    readFact('swap', () => source.swap(), factSchemas.swap),
    readFact('cpuModel', () => source.cpuModel(), factSchemas.cpuModel),
    readFact('cpuCores', () => source.cpuCores(), factSchemas.cpuCores),
    readFact('loadAverage', () => source.loadAverage(), factSchemas.loadAverage),
    readFact('cpuUsage', () => source.cpuUsage(), factSchemas.cpuUsage),
    readFact('disks', () => source.disks(), factSchemas.disks),
    readFact('addresses', () => source.addresses(), factSchemas.addresses),
    readFact('traffic', () => source.traffic(), factSchemas.traffic),
    readFact('temperatures', () => source.temperatures(), factSchemas.temperatures),
    readFact('sessions', () => source.sessions(), factSchemas.sessions),
  ]);

  const snapshot: SystemSnapshot = deepFreeze({
    hostname,
    user,
    osName,
    kernel,
    arch,
    uptimeSeconds,
    memory,
    swap,
    cpuModel,
    cpuCores,
    loadAverage,
    cpuUsage,
    disks,
    addresses,
    traffic,
    temperatures,
    sessions,
  });
  const missing = Object.values(snapshot).filter((fact) => !fact.ok).length;
  logger.debug({ durationMs: Date.now() - started, missing }, 'collected system snapshot');
  return snapshot;
}
