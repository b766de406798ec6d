import { expect } from "chai";
import { IPNET_ALL, IPv4Net } from "../ip/subnet.js";
import { expectPartition, nets, strs } from "./util.js";

const net = (netStr: string) => IPv4Net.fromString(netStr);

describe("IPv4Net.fill", () => {
    const parent = net("10.0.0.0/24");

    it("fills around a single subnet", () => {
        const filled = parent.fill(nets("10.0.0.64/26"));
        expect(strs(filled)).to.deep.equal(["10.0.0.0/26", "10.0.0.64/26", "10.0.0.128/25"]);
        expectPartition(parent, filled);
    });

    it("returns nothing for an empty list", () => {
        expect(parent.fill([])).to.deep.equal([]);
    });

    it("returns nothing when no candidate is a subnet", () => {
        expect(parent.fill(nets("10.0.1.0/24", "192.168.0.0/16"))).to.deep.equal([]);
        expect(parent.fill(nets("10.0.0.0/24"))).to.deep.equal([]);
    });

    it("ignores members that are not networks", () => {
        const filled = parent.fill(["10.0.0.64/26", 42, null, net("10.0.0.64/26"), net("10.0.5.0/24")]);
        expect(strs(filled)).to.deep.equal(["10.0.0.0/26", "10.0.0.64/26", "10.0.0.128/25"]);
    });

    it("drops candidates nested in other candidates", () => {
        const filled = parent.fill(nets("10.0.0.128/25", "10.0.0.128/26", "10.0.0.0/25"));
        expect(strs(filled)).to.deep.equal(["10.0.0.0/25", "10.0.0.128/25"]);
    });

    it("yields nothing when a candidate covers the parent", () => {
        expect(parent.fill(nets("10.0.0.0/16", "10.0.0.64/26"))).to.deep.equal([]);
    });

    it("fills sparse gaps with the largest aligned blocks", () => {
        const filled = parent.fill(nets("10.0.0.200/29", "10.0.0.16/28"));
        expect(strs(filled)).to.deep.equal([
            "10.0.0.0/28",
            "10.0.0.16/28",
            "10.0.0.32/27",
            "10.0.0.64/26",
            "10.0.0.128/26",
            "10.0.0.192/29",
            "10.0.0.200/29",
            "10.0.0.208/28",
            "10.0.0.224/27",
        ]);
        expectPartition(parent, filled);
    });

    it("never lets a filler block overlap the following subnet", () => {
        const filled = parent.fill(nets("10.0.0.0/25", "10.0.0.192/26"));
        expect(strs(filled)).to.deep.equal(["10.0.0.0/25", "10.0.0.128/26", "10.0.0.192/26"]);
        expectPartition(parent, filled);
    });

    it("backfills up to the first subnet", () => {
        const filled = parent.fill(nets("10.0.0.192/26"));
        expect(strs(filled)).to.deep.equal(["10.0.0.0/25", "10.0.0.128/26", "10.0.0.192/26"]);
        expectPartition(parent, filled);
    });

    it("fills the last block of the address space", () => {
        const top = net("255.255.255.0/24");
        const filled = top.fill(nets("255.255.255.0/25"));
        expect(strs(filled)).to.deep.equal(["255.255.255.0/25", "255.255.255.128/25"]);
        expectPartition(top, filled);

        const tail = net("255.255.255.252/30");
        expect(strs(tail.fill(nets("255.255.255.252/32")))).to.deep.equal([
            "255.255.255.252/32",
            "255.255.255.253/32",
            "255.255.255.254/31",
        ]);
    });

    it("partitions the whole address space", () => {
        const filled = IPNET_ALL.fill(nets("10.0.0.0/8"));
        expect(strs(filled)).to.deep.equal([
            "0.0.0.0/5",
            "8.0.0.0/7",
            "10.0.0.0/8",
            "11.0.0.0/8",
            "12.0.0.0/6",
            "16.0.0.0/4",
            "32.0.0.0/3",
            "64.0.0.0/2",
            "128.0.0.0/1",
        ]);
    });
});
