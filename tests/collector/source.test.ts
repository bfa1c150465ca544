import {
  selectAddresses,
  selectDisks,
  selectSessions,
  selectTemperatures,
  selectTraffic,
} from '@collector/index';

describe('selectDisks', () => {
  it('drops loop devices, untyped and empty filesystems, and repeated mounts', () => {
    const disks = selectDisks([
      { fs: '/dev/sda1', type: 'ext4', size: 1000, used: 400, mount: '/' },
      { fs: '/dev/loop3', type: 'squashfs', size: 500, used: 500, mount: '/snap/core/1' },
      { fs: 'overlay', type: 'overlay', size: 800, used: 10, mount: '/var/lib/loop-cache' },
      { fs: 'none', type: '', size: 300, used: 1, mount: '/proc' },
      { fs: 'tmpfs', type: 'tmpfs', size: 0, used: 0, mount: '/run/empty' },
      { fs: '/dev/sda1', type: 'ext4', size: 1000, used: 400, mount: '/' },
      { fs: '/dev/sdb1', type: 'xfs', size: 2000, used: 100, mount: '/data' },
    ]);
    expect(disks).toEqual([
      { mount: '/', device: '/dev/sda1', total: 1000, used: 400 },
      { mount: '/data', device: '/dev/sdb1', total: 2000, used: 100 },
    ]);
  });
});

describe('selectAddresses', () => {
  it('keeps external IPv4 addresses on interfaces that are up', () => {
    const addresses = selectAddresses([
      { iface: 'lo', ip4: '127.0.0.1', internal: true, operstate: 'unknown', speed: null },
      { iface: 'eth0', ip4: '192.168.1.20', internal: false, operstate: 'up', speed: 1000 },
      { iface: 'eth1', ip4: '', internal: false, operstate: 'up', speed: 100 },
      { iface: 'wlan0', ip4: '192.168.1.30', internal: false, operstate: 'down', speed: null },
      { iface: 'docker0', ip4: '172.17.0.1', internal: false, operstate: 'up', speed: -1 },
    ]);
    expect(addresses).toEqual([
      { iface: 'eth0', address: '192.168.1.20', speedMbps: 1000 },
      { iface: 'docker0', address: '172.17.0.1', speedMbps: undefined },
    ]);
  });
});

describe('selectTraffic', () => {
  it('skips loopback and idle interfaces', () => {
    const traffic = selectTraffic([
      { iface: 'lo', rx_bytes: 500, tx_bytes: 500 },
      { iface: 'eth0', rx_bytes: 2048, tx_bytes: 1024 },
      { iface: 'eth1', rx_bytes: 0, tx_bytes: 0 },
    ]);
    expect(traffic).toEqual([{ iface: 'eth0', sent: 1024, received: 2048 }]);
  });
});

describe('selectTemperatures', () => {
  it('names the package, each core and the chipset, skipping missing readings', () => {
    const sensors = selectTemperatures({ main: 48.5, cores: [47, null, 51], chipset: -1 });
    expect(sensors).toEqual([
      { sensor: 'cpu', celsius: 48.5 },
      { sensor: 'core 0', celsius: 47 },
      { sensor: 'core 2', celsius: 51 },
    ]);
  });

  it('returns nothing when no sensor reports', () => {
    expect(selectTemperatures({ main: null, cores: [] })).toEqual([]);
  });
});

describe('selectSessions', () => {
  const now = Date.parse('2026-03-01T12:00:00');

  it('computes how long each session has been open', () => {
    const sessions = selectSessions(
      [
        { user: 'tester', tty: 'pts/0', date: '2026-03-01', time: '10:59', ip: '10.0.0.9' },
        { user: 'admin', tty: '', date: '2026-03-01', time: '11:30', ip: '' },
      ],
      now,
    );
    expect(sessions).toEqual([
      { user: 'tester', terminal: 'pts/0', host: '10.0.0.9', seconds: 3660 },
      { user: 'admin', terminal: 'console', host: undefined, seconds: 1800 },
    ]);
  });

  it('leaves the duration out when the login time cannot be read', () => {
    const [session] = selectSessions([{ user: 'tester', tty: 'tty1', date: '', time: '', ip: '' }], now);
    expect(session?.seconds).toBeUndefined();
  });

  it('never reports a negative duration', () => {
    const [session] = selectSessions(
      [{ user: 'tester', tty: 'tty1', date: '2026-03-01', time: '12:05', ip: '' }],
      now,
    );
    expect(session?.seconds).toBe(0);
  });
});
