import { describe, expect, it } from "vitest";
import { AllocationError } from "./errors.js";
import {
  addIp,
  broadcast,
  calculateSubnetPrefix,
  contains,
  formatCidr,
  formatIp,
  free,
  half,
  ipLessThan,
  overlaps,
  parseCidr,
  parseIp,
  split,
  usableHostAddresses,
} from "./ipam.js";

const c = parseCidr;

describe("address parsing", () => {
  it("reads and writes dotted quads", () => {
    expect(parseIp("10.252.0.1")).toBe(10 * 2 ** 24 + 252 * 2 ** 16 + 1);
    expect(formatIp(parseIp("255.255.255.255"))).toBe("255.255.255.255");
    expect(() => parseIp("10.256.0.1")).toThrow(AllocationError);
    expect(() => parseIp("10.0.1")).toThrow("invalid IPv4 address: 10.0.1");
  });

  it("canonicalizes host bits out of a CIDR", () => {
    expect(formatCidr(c("10.1.1.0/16"))).toBe("10.1.0.0/16");
    expect(formatCidr(c("10.252.1.7/24"))).toBe("10.252.1.0/24");
    expect(() => c("10.1.1.0")).toThrow("invalid CIDR: 10.1.1.0");
    expect(() => c("10.1.1.0/33")).toThrow(AllocationError);
  });

  it("computes broadcast and offsets", () => {
    expect(formatIp(broadcast(c("10.254.0.0/17")))).toBe("10.254.127.255");
    expect(formatIp(addIp(parseIp("10.0.4.255"), 1))).toBe("10.0.5.0");
    expect(formatIp(addIp(parseIp("10.0.5.0"), -1))).toBe("10.0.4.255");
  });
});

describe("containment", () => {
  it("checks both ends of the subnet", () => {
    expect(contains(c("10.252.0.0/17"), c("10.252.1.0/24"))).toBe(true);
    expect(contains(c("10.252.0.0/24"), c("10.252.0.0/23"))).toBe(false);
    expect(overlaps(c("10.252.0.0/23"), c("10.252.1.0/24"))).toBe(true);
    expect(overlaps(c("10.252.0.0/24"), c("10.252.1.0/24"))).toBe(false);
    expect(ipLessThan(parseIp("10.0.0.9"), parseIp("10.0.0.10"))).toBe(true);
  });
});

describe("free", () => {
  it("takes the first aligned block", () => {
    expect(formatCidr(free(c("10.252.0.0/17"), 24, []))).toBe("10.252.0.0/24");
  });

  it("skips allocated blocks and aligns into gaps", () => {
    const allocated = [c("10.252.0.0/24"), c("10.252.2.0/24")];
    expect(formatCidr(free(c("10.252.0.0/17"), 24, allocated))).toBe("10.252.1.0/24");
    expect(formatCidr(free(c("10.252.0.0/17"), 23, allocated))).toBe("10.252.4.0/23");
  });

  it("ignores allocation order", () => {
    const allocated = [c("10.252.4.0/22"), c("10.252.0.0/22")];
    expect(formatCidr(free(c("10.252.0.0/17"), 22, allocated))).toBe("10.252.8.0/22");
  });

  it("fails when the request is larger than the network", () => {
    expect(() => free(c("10.252.0.0/24"), 23, [])).toThrow("have: /24, requested: /23");
  });

  it("fails when a subnet lies outside the network", () => {
    expect(() => free(c("10.252.0.0/24"), 25, [c("10.1.0.0/24")])).toThrow("10.1.0.0 is not contained by 10.252.0.0/24");
  });

  it("fails when nothing fits", () => {
    const net = c("10.252.0.0/24");
    expect(() => free(net, 25, [c("10.252.0.0/25"), c("10.252.0.128/25")])).toThrow("tried to fit: /25");
  });
});

describe("splitting", () => {
  it("computes the prefix for n subnets", () => {
    expect(calculateSubnetPrefix(16, 1)).toBe(16);
    expect(calculateSubnetPrefix(16, 3)).toBe(18);
    expect(calculateSubnetPrefix(16, 4)).toBe(18);
    expect(() => calculateSubnetPrefix(16, 0)).toThrow("divide by zero");
    expect(() => calculateSubnetPrefix(31, 3)).toThrow("no room in network /31 to accommodate 3 subnets");
  });

  it("splits and halves", () => {
    expect(split(c("10.0.0.0/24"), 3).map(formatCidr)).toEqual(["10.0.0.0/26", "10.0.0.64/26", "10.0.0.128/26"]);
    expect(half(c("10.0.0.0/24")).map(formatCidr)).toEqual(["10.0.0.0/25", "10.0.0.128/25"]);
    expect(() => half(c("10.0.0.1/32"))).toThrow(AllocationError);
  });

  it("counts usable hosts", () => {
    expect(usableHostAddresses(24)).toBe(254);
    expect(usableHostAddresses(31)).toBe(2);
    expect(usableHostAddresses(32)).toBe(1);
  });
});
