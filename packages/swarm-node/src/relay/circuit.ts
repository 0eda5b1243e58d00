const CIRCUIT = '/p2p-circuit';

export function isCircuitAddress(addr: string): boolean {
	return addr.includes(CIRCUIT);
}

/** Address other peers use to reach `selfId` through the relay at `relayAddress`. */
export function circuitAddress(relayAddress: string, selfId: string): string {
	return `${relayAddress}${CIRCUIT}/p2p/${selfId}`;
}

/** Listen address that asks the relay for a reservation: the circuit address minus the destination. */
export function relayListenAddress(circuitAddr: string): string {
	const end = circuitAddr.indexOf(CIRCUIT);
	if (end < 0) {
		throw new Error(`${circuitAddr} is not a circuit address`);
	}
	return circuitAddr.slice(0, end + CIRCUIT.length);
}
