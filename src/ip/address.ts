import { ValidationError } from "../util/errors.js";
import { compareNumbers } from "../util/index.js";

const OCTET_REGEX = /^\d{1,3}$/;

export class IPAddr {
    public static fromString(ipStr: string) {
        const ipS = ipStr.trim().split(".");
        if (ipS.length !== 4) {
            throw new ValidationError(`Invalid IPv4 address ${ipStr}`);
        }
        let value = 0;
        for (const octetStr of ipS) {
            if (!OCTET_REGEX.test(octetStr)) {
                throw new ValidationError(`Invalid IPv4 address ${ipStr}`);
            }
            const octet = parseInt(octetStr, 10);
            if (octet > 255) {
                throw new ValidationError(`Invalid IPv4 address ${ipStr}`);
            }
            value = value * 256 + octet;
        }
        return new IPAddr(value);
    }

    public static fromByteArray(array: ArrayLike<number>, offset = 0) {
        if (offset < 0 || offset + 4 > array.length) {
            throw new RangeError("Not enough bytes for an IPv4 address");
        }
        let value = 0;
        for (let i = 0; i < 4; i++) {
            value = value * 256 + ((array[offset + i] ?? 0) & 0xFF);
        }
        return new IPAddr(value);
    }

    public static fromInt32(ipInt: number) {
        return new IPAddr(ipInt);
    }

    private readonly raw32: number;

    private constructor(value: number) {
        this.raw32 = value >>> 0;
    }

    public equals(ip?: IPAddr) {
        if (!ip) {
            return false;
        }
        return this.raw32 === ip.raw32;
    }

    public compareTo(ip: IPAddr) {
        return compareNumbers(this.raw32, ip.raw32);
    }

    public toBytes(array: Uint8Array, offset: number) {
        array[offset] = this.raw32 >>> 24;
        array[1 + offset] = (this.raw32 >>> 16) & 0xFF;
        array[2 + offset] = (this.raw32 >>> 8) & 0xFF;
        array[3 + offset] = this.raw32 & 0xFF;
    }

    public toByteArray() {
        const res = new Uint8Array(4);
        this.toBytes(res, 0);
        return res;
    }

    public toInt32() {
        return this.raw32;
    }

    public toString() {
        return `${this.raw32 >>> 24}.${(this.raw32 >>> 16) & 0xFF}.${(this.raw32 >>> 8) & 0xFF}.${this.raw32 & 0xFF}`;
    }

    public next(): IPAddr | undefined {
        if (this.raw32 === 0xFFFFFFFF) {
            return undefined;
        }
        return new IPAddr(this.raw32 + 1);
    }

    public prev(): IPAddr | undefined {
        if (this.raw32 === 0) {
            return undefined;
        }
        return new IPAddr(this.raw32 - 1);
    }

    public isMulticast() {
        const first = this.raw32 >>> 24;
        return first >= 224 && first <= 239;
    }

    public isBroadcast() {
        return this.raw32 === 0xFFFFFFFF;
    }

    public isUnicast() {
        return !this.isBroadcast() && !this.isMulticast();
    }

    public isLoopback() {
        return this.raw32 >>> 24 === 127;
    }

    public isLinkLocal() {
        return this.raw32 >>> 16 === 0xA9FE;
    }
}

export const IP_NONE = IPAddr.fromInt32(0);
export const IP_BROADCAST = IPAddr.fromString("255.255.255.255");
