import { ErrorFactory } from '../utils/error-handling.util';

/**
 * Fixed IPv4 client address range carved from the tunnel subnet.
 *
 * The network address, the first host (the server's own tunnel address)
 * and the broadcast address are never handed out, so a /24 holds 253
 * client addresses (`.2` to `.254`).
 *
 * Allocation is next-fit: the scan starts just after the most recently
 * allocated offset and wraps around. Not synchronised; the peer manager
 * owns the only instance and serialises access to it.
 */
export class AddressPool {
  private static readonly FIRST_CLIENT_OFFSET = 2;

  private readonly network: number;
  readonly prefixLength: number;
  readonly capacity: number;
  private readonly allocated = new Set<number>();
  private nextOffset = AddressPool.FIRST_CLIENT_OFFSET;

  constructor(cidr: string) {
    const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(cidr.trim());
    if (!match) {
      throw ErrorFactory.configuration(`invalid tunnel subnet: ${cidr}`);
    }
    const octets = match.slice(1, 5).map(Number);
    const prefix = Number(match[5]);
    if (octets.some((octet) => octet > 255) || prefix < 16 || prefix > 30) {
      throw ErrorFactory.configuration(`unsupported tunnel subnet: ${cidr} (prefix must be /16 to /30)`);
    }

    const size = 2 ** (32 - prefix);
    const ip = octets.reduce((acc, octet) => acc * 256 + octet, 0);
    this.network = ip - (ip % size);
    this.prefixLength = prefix;
    this.capacity = size - 3;
  }

  /** The server's own address inside the subnet. */
  get serverAddress(): string {
    return AddressPool.format(this.network + 1);
  }

  get allocatedCount(): number {
    return this.allocated.size;
  }

  get availableCount(): number {
    return this.capacity - this.allocated.size;
  }

  /**
   * Marks and returns the next free address.
   * @throws pool-exhausted error when every client address is held
   */
  allocate(): string {
    for (let i = 0; i < this.capacity; i++) {
      const offset = this.offsetAt(this.nextOffset + i);
      if (!this.allocated.has(offset)) {
        this.allocated.add(offset);
        this.nextOffset = this.offsetAt(offset + 1);
        return AddressPool.format(this.network + offset);
      }
    }
    throw ErrorFactory.poolExhausted(this.capacity);
  }

  /**
   * Returns an address to the pool.
   * @returns false when the address was not allocated
   */
  release(address: string): boolean {
    const offset = this.offsetOf(address);
    return offset !== null && this.allocated.delete(offset);
  }

  isAllocated(address: string): boolean {
    const offset = this.offsetOf(address);
    return offset !== null && this.allocated.has(offset);
  }

  allocatedAddresses(): string[] {
    return [...this.allocated].sort((a, b) => a - b).map((offset) => AddressPool.format(this.network + offset));
  }

  /** Maps any integer onto the client range `2..capacity+1`. */
  private offsetAt(n: number): number {
    const first = AddressPool.FIRST_CLIENT_OFFSET;
    return ((((n - first) % this.capacity) + this.capacity) % this.capacity) + first;
  }

  private offsetOf(address: string): number | null {
    const octets = address.split('.').map(Number);
    if (octets.length !== 4 || octets.some((octet) => !Number.isInteger(octet) || octet < 0 || octet > 255)) {
      return null;
    }
    const offset = octets.reduce((acc, octet) => acc * 256 + octet, 0) - this.network;
    const first = AddressPool.FIRST_CLIENT_OFFSET;
    return offset >= first && offset < first + this.capacity ? offset : null;
  }

  private static format(ip: number): string {
    return [ip >>> 24, (ip >>> 16) & 255, (ip >>> 8) & 255, ip & 255].join('.');
  }
}
