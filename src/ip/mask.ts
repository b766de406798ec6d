import { ValidationError } from "../util/errors.js";
import { compareNumbers } from "../util/index.js";
import { IPAddr } from "./address.js";

const subnetLenToBitmask: number[] = [];
const bitmaskToSubnetLen = new Map<number, number>();

subnetLenToBitmask[0] = 0;
bitmaskToSubnetLen.set(0, 0);

for (let subnetLen = 1; subnetLen <= 32; subnetLen++) {
  const bitmask = ~((1 << (32 - subnetLen)) - 1) >>> 0;
  subnetLenToBitmask[subnetLen] = bitmask;
  bitmaskToSubnetLen.set(bitmask, subnetLen);
}

const PREFIX_REGEX = /^\/?(\d{1,2})$/;

// Mask32 is a prefix length together with its left-aligned 32-bit mask.
export class Mask32 {
  public static fromPrefixLen(prefixLen: number) {
    const bitmask = Number.isInteger(prefixLen) ? subnetLenToBitmask[prefixLen] : undefined;
    if (bitmask === undefined) {
      throw new ValidationError(`Invalid prefix length ${prefixLen}`);
    }
    return new Mask32(prefixLen, bitmask);
  }

  // Accepts "24", "/24" or a dotted mask such as "255.255.255.0".
  public static fromString(maskStr: string) {
    const trimmed = maskStr.trim();
    if (trimmed.includes(".")) {
      const bitmask = IPAddr.fromString(trimmed).toInt32();
      const prefixLen = bitmaskToSubnetLen.get(bitmask);
      if (prefixLen === undefined) {
        throw new ValidationError(`Invalid netmask ${maskStr}`);
      }
      return new Mask32(prefixLen, bitmask);
    }

    const match = PREFIX_REGEX.exec(trimmed);
    if (!match?.[1]) {
      throw new ValidationError(`Invalid netmask ${maskStr}`);
    }
    return Mask32.fromPrefixLen(parseInt(match[1], 10));
  }

  private constructor(private readonly bits: number, private readonly bitmask: number) {
  }

  public prefixLen() {
    return this.bits;
  }

  public mask() {
    return this.bitmask;
  }

  public hostmask() {
    return (this.bitmask ^ 0xFFFFFFFF) >>> 0;
  }

  // Number of addresses covered. A /0 reports 0 since 2^32 is treated as unrepresentable.
  public len() {
    if (this.bits === 0) {
      return 0;
    }
    return Math.pow(2, 32 - this.bits);
  }

  // Orders by capacity: the shorter prefix (larger block) compares greater.
  public compareTo(other: Mask32) {
    return compareNumbers(other.bits, this.bits);
  }

  public equals(other?: Mask32) {
    if (!other) {
      return false;
    }
    return this.bits === other.bits;
  }

  public extended() {
    return IPAddr.fromInt32(this.bitmask).toString();
  }

  public toString() {
    return `/${this.bits}`;
  }
}
