import { expect } from "chai";
import { IPv4Net } from "../ip/subnet.js";

export function nets(...netStrs: string[]) {
    return netStrs.map((netStr) => IPv4Net.fromString(netStr));
}

export function strs(list: readonly IPv4Net[]) {
    return list.map((net) => net.toString());
}

// Asserts that list tiles parent exactly: ascending, gapless, non-overlapping.
export function expectPartition(parent: IPv4Net, list: readonly IPv4Net[]) {
    let addr = parent.network().toInt32();
    for (const net of list) {
        expect(net.network().toInt32(), `${net} starts at the end of the previous block`).to.equal(addr);
        expect(parent.relationship(net), `${net} lies inside ${parent}`).to.not.equal(undefined);
        addr += Math.pow(2, 32 - net.netmask().prefixLen());
    }
    expect(addr).to.equal(parent.network().toInt32() + Math.pow(2, 32 - parent.netmask().prefixLen()));
}
