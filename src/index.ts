export { IP_BROADCAST, IP_NONE, IPAddr } from "./ip/address.js";
export { Mask32 } from "./ip/mask.js";
export { IPNET_ALL, IPNET_LINK_LOCAL, IPNET_LOOPBACK, IPNET_MULTICAST, IPv4Net, Relation } from "./ip/subnet.js";
export { discardSubnets, filterNets, sortNets, summarizeNets } from "./ip/list.js";
export { formatPartition, isDebug, partitionOut, setDebug } from "./config.js";
export { InvalidArgumentError, ValidationError } from "./util/errors.js";
export { logDebug } from "./util/log.js";
export type { Ordering } from "./util/index.js";
