/** Time allowed for address discovery to converge before the reachability probe reads addresses. */
export const GRACE_PERIOD_MS = 30_000;

/** Time allowed for the OS to release the previous node's listening port before recreation. */
export const SETTLE_PERIOD_MS = 30_000;

/** Upper bound for a single bootstrap dial. */
export const DIAL_TIMEOUT_MS = 30_000;

/** Public bootstrap peer used as the circuit relay for NAT-bound nodes. */
export const DEFAULT_RELAY_ADDRESS = '/ip4/104.131.131.82/tcp/4001/p2p/QmaCpDMGvV2BGHeYERUEnRQAwe3N8SzbUtfsmvsqQLuvuJ';

const LIBP2P_BOOTSTRAPPERS = [
	'/dnsaddr/bootstrap.libp2p.io/p2p/QmNnooDu7bfjPFoTZYxMNLWUQJyrVwtbZg5gBMjTezGAJN',
	'/dnsaddr/bootstrap.libp2p.io/p2p/QmQCU2EcMqAqQPR2i9bChDtGNJchTbq5TbXJJ16u19uLTa',
	'/dnsaddr/bootstrap.libp2p.io/p2p/QmbLHAnMoJPWSCR5Zhtx6BHJX9KiKNN6tpvbUcqanj75Nb',
	'/dnsaddr/bootstrap.libp2p.io/p2p/QmcZf59bWwK5XFi76CZX8cbJ4BhTzzA3gU1ZjYZcYW3dwt'
];

/** Seed list written into the `Bootstrap` field of a new repository. */
export const DEFAULT_BOOTSTRAP_PEERS: readonly string[] = [
	...LIBP2P_BOOTSTRAPPERS,
	DEFAULT_RELAY_ADDRESS
];

/** Peers dialed directly after every startup, regardless of relay state. */
export const INTRODUCTION_PEERS: readonly string[] = [
	...LIBP2P_BOOTSTRAPPERS,

	// cluster pinning peers; each is listed once per transport
	'/ip4/138.201.67.219/tcp/4001/p2p/QmUd6zHcbkbcs7SMxwLs48qZVX3vpcM8errYS7xEczwRMA',
	'/ip4/138.201.67.219/udp/4001/quic/p2p/QmUd6zHcbkbcs7SMxwLs48qZVX3vpcM8errYS7xEczwRMA',
	'/ip4/138.201.68.74/tcp/4001/p2p/QmdnXwLrC8p1ueiq2Qya8joNvk3TVVDAut7PrikmZwubtR',
	'/ip4/138.201.68.74/udp/4001/quic/p2p/QmdnXwLrC8p1ueiq2Qya8joNvk3TVVDAut7PrikmZwubtR',
	'/ip4/94.130.135.167/tcp/4001/p2p/QmUEMvxS2e7iDrereVYc5SWPauXPyNwxcy9BXZrC1QTcHE',
	'/ip4/94.130.135.167/udp/4001/quic/p2p/QmUEMvxS2e7iDrereVYc5SWPauXPyNwxcy9BXZrC1QTcHE'
];

export const DEFAULT_SWARM_ADDRESSES: readonly string[] = [
	'/ip4/0.0.0.0/tcp/4001',
	'/ip6/::/tcp/4001'
];
