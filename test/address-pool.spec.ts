import { AddressPool } from '../src/services/address-pool';

describe('AddressPool', () => {
  it('should expose 253 client addresses for a /24', () => {
    const pool = new AddressPool('10.8.0.0/24');
    expect(pool.capacity).toBe(253);
    expect(pool.prefixLength).toBe(24);
    expect(pool.serverAddress).toBe('10.8.0.1');
  });

  it('should normalise a host address to its network', () => {
    const pool = new AddressPool('10.8.0.77/24');
    expect(pool.serverAddress).toBe('10.8.0.1');
    expect(pool.allocate()).toBe('10.8.0.2');
  });

  it('should allocate from .2 upwards', () => {
    const pool = new AddressPool('10.8.0.0/24');
    expect([pool.allocate(), pool.allocate(), pool.allocate()]).toEqual(['10.8.0.2', '10.8.0.3', '10.8.0.4']);
    expect(pool.allocatedCount).toBe(3);
    expect(pool.availableCount).toBe(250);
  });

  it('should allocate next-fit after a release', () => {
    const pool = new AddressPool('10.8.0.0/24');
    pool.allocate();
    const second = pool.allocate();
    pool.allocate();

    expect(pool.release(second)).toBe(true);
    expect(pool.allocate()).toBe('10.8.0.5');
  });

  it('should wrap around to released addresses', () => {
    const pool = new AddressPool('192.168.10.0/29');
    expect(pool.capacity).toBe(5);
    const all = Array.from({ length: 5 }, () => pool.allocate());
    expect(all).toEqual(['192.168.10.2', '192.168.10.3', '192.168.10.4', '192.168.10.5', '192.168.10.6']);

    pool.release('192.168.10.3');
    expect(pool.allocate()).toBe('192.168.10.3');
  });

  it('should throw pool exhausted when every address is held', () => {
    const pool = new AddressPool('10.0.0.0/30');
    expect(pool.capacity).toBe(1);
    expect(pool.allocate()).toBe('10.0.0.2');
    expect(() => pool.allocate()).toThrow('IP pool exhausted');
  });

  it('should never hand out the network, server or broadcast address', () => {
    const pool = new AddressPool('10.8.0.0/24');
    const handed = new Set(Array.from({ length: pool.capacity }, () => pool.allocate()));
    expect(handed.size).toBe(253);
    expect(handed.has('10.8.0.0')).toBe(false);
    expect(handed.has('10.8.0.1')).toBe(false);
    expect(handed.has('10.8.0.255')).toBe(false);
  });

  it('should report releases of unknown addresses', () => {
    const pool = new AddressPool('10.8.0.0/24');
    expect(pool.release('10.8.0.9')).toBe(false);
    expect(pool.release('10.9.0.2')).toBe(false);
    expect(pool.release('not-an-ip')).toBe(false);
  });

  it('should list allocated addresses in numeric order', () => {
    const pool = new AddressPool('10.8.0.0/24');
    for (let i = 0; i < 10; i++) pool.allocate();
    pool.release('10.8.0.4');
    expect(pool.allocatedAddresses()).toEqual([
      '10.8.0.2', '10.8.0.3', '10.8.0.5', '10.8.0.6', '10.8.0.7',
      '10.8.0.8', '10.8.0.9', '10.8.0.10', '10.8.0.11',
    ]);
    expect(pool.isAllocated('10.8.0.4')).toBe(false);
    expect(pool.isAllocated('10.8.0.11')).toBe(true);
  });

  it.each(['10.8.0.0', '10.8.0.0/8', '10.8.0.0/31', '300.1.1.1/24'])('should reject subnet %s', (cidr) => {
    expect(() => new AddressPool(cidr)).toThrow('tunnel subnet');
  });
});
