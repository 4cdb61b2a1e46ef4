import { AllocationError } from "./errors.js";
import { die } from "./util.js";

// IPv4 addresses are carried as unsigned 32-bit integers.
export type Cidr = {
  ip: number;
  prefix: number;
};

export type IpRange = {
  start: number;
  end: number;
};

const MAX_IP = 0xffffffff;

export function parseIp(s: string): number {
  const parts = s.trim().split(".");
  if (parts.length !== 4 || parts.some((p) => !/^[0-9]{1,3}$/.test(p) || Number(p) > 255)) {
    die(`invalid IPv4 address: ${s}`, AllocationError);
  }
  return parts.reduce((acc, p) => acc * 256 + Number(p), 0);
}

export function formatIp(n: number): string {
  return [(n >>> 24) & 255, (n >>> 16) & 255, (n >>> 8) & 255, n & 255].join(".");
}

export function networkSize(prefix: number): number {
  return 2 ** (32 - prefix);
}

export function maskOf(prefix: number): number {
  return prefix === 0 ? 0 : (MAX_IP << (32 - prefix)) >>> 0;
}

// Host bits are cleared, so 10.1.1.0/16 reads as 10.1.0.0/16.
export function parseCidr(s: string): Cidr {
  const [ip, len, ...rest] = s.trim().split("/");
  if (len === undefined || rest.length || !/^[0-9]{1,2}$/.test(len) || Number(len) > 32) {
    die(`invalid CIDR: ${s}`, AllocationError);
  }
  const prefix = Number(len);
  return { ip: (parseIp(ip) & maskOf(prefix)) >>> 0, prefix };
}

export function formatCidr(c: Cidr): string {
  return `${formatIp(c.ip)}/${c.prefix}`;
}

// First address of the block, whether or not the stored address has host bits set.
export function networkAddress(c: Cidr): number {
  return (c.ip & maskOf(c.prefix)) >>> 0;
}

export function broadcast(c: Cidr): number {
  return networkAddress(c) + networkSize(c.prefix) - 1;
}

export function addIp(ip: number, n: number): number {
  const out = ip + n;
  if (out < 0 || out > MAX_IP) die(`address arithmetic out of range: ${formatIp(ip)} + ${n}`, AllocationError);
  return out;
}

export function containsIp(c: Cidr, ip: number): boolean {
  return ip >= networkAddress(c) && ip <= broadcast(c);
}

export function contains(network: Cidr, subnet: Cidr): boolean {
  return containsIp(network, subnet.ip) && containsIp(network, broadcast(subnet));
}

export function overlaps(a: Cidr, b: Cidr): boolean {
  return networkAddress(a) <= broadcast(b) && networkAddress(b) <= broadcast(a);
}

export function ipLessThan(a: number, b: number): boolean {
  return a < b;
}

export function compareCidrs(a: Cidr, b: Cidr): number {
  return a.ip - b.ip || a.prefix - b.prefix;
}

function freeRanges(network: Cidr, sorted: Cidr[]): IpRange[] {
  const out: IpRange[] = [];
  let next = network.ip;
  for (const s of sorted) {
    if (s.ip > next) out.push({ start: next, end: s.ip - 1 });
    next = Math.max(next, broadcast(s) + 1);
  }
  if (next <= broadcast(network)) out.push({ start: next, end: broadcast(network) });
  return out;
}

/**
 * First block of the requested prefix length inside `network` that does not
 * overlap any of `allocated`. Candidate blocks start on their natural boundary.
 */
export function free(network: Cidr, prefix: number, allocated: Cidr[]): Cidr {
  if (prefix < network.prefix) die(`have: /${network.prefix}, requested: /${prefix}`, AllocationError);
  for (const s of allocated) {
    if (!containsIp(network, s.ip)) die(`${formatIp(s.ip)} is not contained by ${formatCidr(network)}`, AllocationError);
  }
  const size = networkSize(prefix);
  for (const r of freeRanges(network, [...allocated].sort(compareCidrs))) {
    const start = Math.ceil(r.start / size) * size;
    if (r.end - start + 1 >= size) return { ip: start, prefix };
  }
  return die(`tried to fit: /${prefix}`, AllocationError);
}

export function calculateSubnetPrefix(prefix: number, n: number): number {
  if (n <= 0) die("divide by zero", AllocationError);
  const bitsNeeded = n === 1 ? 0 : Math.ceil(Math.log2(n));
  if (bitsNeeded > 32 - prefix) die(`no room in network /${prefix} to accommodate ${n} subnets`, AllocationError);
  return prefix + bitsNeeded;
}

export function split(network: Cidr, n: number): Cidr[] {
  const prefix = calculateSubnetPrefix(network.prefix, n);
  const out: Cidr[] = [];
  for (let i = 0; i < n; i++) out.push(free(network, prefix, out));
  return out;
}

export function half(network: Cidr): [Cidr, Cidr] {
  if (network.prefix === 32) die(`single IP network ${formatCidr(network)} cannot be halved`, AllocationError);
  const first = free(network, network.prefix + 1, []);
  return [first, free(network, network.prefix + 1, [first])];
}

// /32 and /31 have no network or broadcast address to set aside.
export function usableHostAddresses(prefix: number): number {
  if (prefix === 32) return 1;
  if (prefix === 31) return 2;
  return networkSize(prefix) - 2;
}
