import { assertInteger, ValidationError } from "../util/errors.js";
import type { Ordering } from "../util/index.js";
import { logDebug } from "../util/log.js";
import { IPAddr } from "./address.js";
import { discardSubnets, filterNets, sortNets } from "./list.js";
import { Mask32 } from "./mask.js";

const ADDRESS_SPACE_END = Math.pow(2, 32);

// How this network relates to another by containment. Unrelated networks have no Relation.
export enum Relation {
  Subnet = -1,
  Equal = 0,
  Supernet = 1,
}

function blockSize(prefixLen: number) {
  return Math.pow(2, 32 - prefixLen);
}

export class IPv4Net {
  // Accepts "10.0.0.0/24", "10.0.0.0 255.255.255.0" or a bare address, which becomes a /32.
  public static fromString(netStr: string) {
    const trimmed = netStr.trim();
    let parts: string[];
    if (trimmed.includes("/")) {
      parts = trimmed.split("/");
    } else if (/\s/.test(trimmed)) {
      parts = trimmed.split(/\s+/);
    } else {
      parts = [trimmed, "32"];
    }

    const [addrStr, maskStr] = parts;
    if (parts.length !== 2 || addrStr === undefined || maskStr === undefined) {
      throw new ValidationError(`Invalid IPv4 network ${netStr}`);
    }
    return new IPv4Net(IPAddr.fromString(addrStr), Mask32.fromString(maskStr));
  }

  public static parse(netStr: string) {
    return IPv4Net.fromString(netStr);
  }

  private readonly base: IPAddr;
  private readonly m32: Mask32;

  constructor(ip: IPAddr, m32: Mask32 = Mask32.fromPrefixLen(32)) {
    this.m32 = m32;
    this.base = IPAddr.fromInt32(ip.toInt32() & m32.mask());
  }

  public network() {
    return this.base;
  }

  public netmask() {
    return this.m32;
  }

  public len() {
    return this.m32.len();
  }

  public equals(ipNet?: IPv4Net) {
    if (!ipNet) {
      return false;
    }
    return this.m32.equals(ipNet.m32) && this.base.equals(ipNet.base);
  }

  public contains(ip?: IPAddr) {
    if (!ip) {
      return false;
    }
    return ((ip.toInt32() & this.m32.mask()) >>> 0) === this.base.toInt32();
  }

  // Orders by network address, then by netmask comparison.
  public compare(other: IPv4Net): Ordering {
    const res = this.base.compareTo(other.base);
    if (res !== 0) {
      return res;
    }
    return this.m32.compareTo(other.m32);
  }

  public relationship(other: IPv4Net): Relation | undefined {
    const addr = this.base.toInt32();
    const otherAddr = other.base.toInt32();

    // same network address: only the netmasks decide
    if (addr === otherAddr) {
      switch (this.m32.compareTo(other.m32)) {
        case 1:
          return Relation.Supernet;
        case -1:
          return Relation.Subnet;
        default:
          return Relation.Equal;
      }
    }

    const hostmask = this.m32.hostmask();
    const otherHostmask = other.m32.hostmask();
    if (((addr | hostmask) >>> 0) === ((otherAddr | hostmask) >>> 0)) {
      return Relation.Supernet;
    }
    if (((addr | otherHostmask) >>> 0) === ((otherAddr | otherHostmask) >>> 0)) {
      return Relation.Subnet;
    }
    return undefined;
  }

  public nth(index: number): IPAddr | undefined {
    assertInteger("index", index);
    if (index < 0 || index >= this.len()) {
      return undefined;
    }
    return IPAddr.fromInt32(this.base.toInt32() + index);
  }

  // The n-th sibling of equal size after this network, or before it when backward is set.
  public nthSib(nth: number, backward = false): IPv4Net | undefined {
    assertInteger("nth", nth);
    if (nth < 0) {
      return undefined;
    }

    const size = blockSize(this.m32.prefixLen());
    const index = this.base.toInt32() / size;
    let addr: number;
    if (backward) {
      addr = (index - nth) * size;
      if (addr < 0) {
        return undefined;
      }
    } else {
      addr = (index + nth) * size;
      if (addr > 0xFFFFFFFF) {
        return undefined;
      }
    }
    return new IPv4Net(IPAddr.fromInt32(addr), this.m32);
  }

  public nextSib() {
    return this.nthSib(1, false);
  }

  public prevSib() {
    return this.nthSib(1, true);
  }

  // Widens the prefix for as long as the network address stays a valid base.
  public grow() {
    return this.growWithin(ADDRESS_SPACE_END);
  }

  public next() {
    return this.nextSib()?.grow();
  }

  public prev() {
    return this.grow().prevSib();
  }

  public subnetCount(prefixLen: number) {
    assertInteger("prefixLen", prefixLen);
    const bits = this.m32.prefixLen();
    if (prefixLen <= bits || prefixLen > 32 || prefixLen - bits >= 32) {
      return 0;
    }
    return Math.pow(2, prefixLen - bits);
  }

  public nthSubnet(prefixLen: number, index: number): IPv4Net | undefined {
    assertInteger("index", index);
    const count = this.subnetCount(prefixLen);
    if (count === 0 || index < 0 || index >= count) {
      return undefined;
    }
    const sub0 = new IPv4Net(this.base, Mask32.fromPrefixLen(prefixLen));
    return sub0.nthSib(index, false);
  }

  public resize(prefixLen: number) {
    return new IPv4Net(this.base, Mask32.fromPrefixLen(prefixLen));
  }

  // Merges this network and its equal-sized sibling into their parent block.
  // Only the parent bits are compared, so a network summarized with itself also yields the parent.
  public summarize(other: IPv4Net): IPv4Net | undefined {
    const bits = this.m32.prefixLen();
    if (bits === 0 || bits !== other.m32.prefixLen()) {
      return undefined;
    }

    const parentSize = blockSize(bits - 1);
    if (Math.floor(this.base.toInt32() / parentSize) !== Math.floor(other.base.toInt32() / parentSize)) {
      return undefined;
    }
    return this.resize(bits - 1);
  }

  // Returns the candidates that are subnets of this network, in order, with every gap
  // between them covered by the largest aligned blocks that fit.
  public fill(list: readonly unknown[]): IPv4Net[] {
    const subs = sortNets(discardSubnets(filterNets(list))
      .filter((sub) => this.relationship(sub) === Relation.Supernet));

    const first = subs[0];
    if (!first) {
      return [];
    }

    let filled: IPv4Net[] = [];
    const base = this.base.toInt32();
    if (first.base.toInt32() !== base) {
      filled = first.backfill(base);
    }

    const ceil = this.nextSib()?.base.toInt32() ?? ADDRESS_SPACE_END;
    subs.forEach((sub, i) => {
      filled.push(sub);
      const limit = subs[i + 1]?.base.toInt32() ?? ceil;
      filled.push(...sub.fwdfill(limit));
    });

    logDebug(() => `fill ${this}: ${subs.length} subnets, ${filled.length - subs.length} filler blocks`);
    return filled;
  }

  public extended() {
    return `${this.base} ${this.m32.extended()}`;
  }

  public toString() {
    return `${this.base}${this.m32}`;
  }

  // Blocks from limit up to this network, ascending.
  private backfill(limit: number) {
    const nets: IPv4Net[] = [];
    let cur: IPv4Net = this;
    for (;;) {
      const net = cur.prev();
      if (!net || net.base.toInt32() < limit) {
        break;
      }
      nets.unshift(net);
      cur = net;
    }
    return nets;
  }

  // Blocks from the end of this network up to limit (exclusive), each as large as alignment and limit allow.
  private fwdfill(limit: number) {
    const nets: IPv4Net[] = [];
    let addr = this.base.toInt32() + blockSize(this.m32.prefixLen());
    while (addr < limit) {
      const net = new IPv4Net(IPAddr.fromInt32(addr)).growWithin(limit);
      nets.push(net);
      addr += blockSize(net.m32.prefixLen());
    }
    return nets;
  }

  // Like grow, but the grown block must also end at or before limit.
  private growWithin(limit: number) {
    const addr = this.base.toInt32();
    let mask = this.m32.mask();
    let prefixLen = this.m32.prefixLen();
    while (prefixLen > 0) {
      mask = (mask << 1) >>> 0;
      // a '1' bit in the widened host portion means the bit boundary was crossed
      if (((addr | mask) >>> 0) !== mask || addr + blockSize(prefixLen - 1) > limit) {
        break;
      }
      prefixLen--;
    }
    return new IPv4Net(this.base, Mask32.fromPrefixLen(prefixLen));
  }
}

export const IPNET_ALL = IPv4Net.fromString("0.0.0.0/0");
export const IPNET_LOOPBACK = IPv4Net.fromString("127.0.0.0/8");
export const IPNET_LINK_LOCAL = IPv4Net.fromString("169.254.0.0/16");
export const IPNET_MULTICAST = IPv4Net.fromString("224.0.0.0/4");
