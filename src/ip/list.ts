import { logDebug } from "../util/log.js";
import { IPv4Net, Relation } from "./subnet.js";

export function filterNets(list: readonly unknown[]): IPv4Net[] {
  return list.filter((item): item is IPv4Net => item instanceof IPv4Net);
}

export function sortNets(list: readonly IPv4Net[]): IPv4Net[] {
  return [...list].sort((a, b) => a.compare(b));
}

// Drops members contained in another member, and repeats of an earlier member.
export function discardSubnets(list: readonly IPv4Net[]): IPv4Net[] {
  return list.filter((net, i) => {
    return !list.some((other, j) => {
      const rel = other.relationship(net);
      return rel === Relation.Supernet || (rel === Relation.Equal && j < i);
    });
  });
}

// Reduces the list to the fewest blocks covering the same addresses.
export function summarizeNets(list: readonly unknown[]): IPv4Net[] {
  const nets = sortNets(discardSubnets(filterNets(list)));
  const summed: IPv4Net[] = [];
  for (const net of nets) {
    let cur = net;
    for (;;) {
      const last = summed[summed.length - 1];
      const merged = last?.summarize(cur);
      if (!merged) {
        break;
      }
      summed.pop();
      cur = merged;
    }
    summed.push(cur);
  }
  logDebug(() => `summarize: ${nets.length} networks into ${summed.length}`);
  return summed;
}
