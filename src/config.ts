import { IPv4Net } from "./ip/subnet.js";
import { logDebug } from "./util/log.js";

let debug = false;

export function setDebug(enabled: boolean) {
    debug = enabled;
}

export function isDebug() {
    return debug;
}

export function formatPartition(parent: IPv4Net, nets: readonly IPv4Net[], candidates: readonly IPv4Net[] = []) {
    const rows = nets.map((net) => {
        const kind = candidates.some((candidate) => candidate.equals(net)) ? "subnet" : "fill";
        return `${net.toString().padEnd(18)} ${kind}`;
    });
    return `PARTITION ${parent}\n${rows.join("\n")}`;
}

export function partitionOut(parent: IPv4Net, candidates: readonly IPv4Net[]) {
    const filled = parent.fill(candidates);
    logDebug(formatPartition(parent, filled, candidates));
    return filled;
}
