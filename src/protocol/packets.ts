import { Packr } from "msgpackr";

/**
 * Plain MessagePack maps; records would tie the wire format to this encoder's
 * structure table.
 */
const packr = new Packr({ useRecords: false, mapsAsObjects: true });

/**
 * A decoded wire message. The payload is untrusted until parsed with one of
 * the protocol schemas.
 */
export interface Packet {
	type: number;
	payload: unknown;
}

/**
 * Encode a message as `[type: u8][MessagePack body]`.
 * A payload of `undefined` produces a bare one-byte packet.
 */
export function encodePacket(type: number, payload?: unknown): Uint8Array {
	if (payload === undefined) {
		return new Uint8Array([type]);
	}

	const body = packr.pack(payload);
	const message = new Uint8Array(1 + body.byteLength);
	message[0] = type;
	message.set(body, 1);
	return message;
}

/**
 * Split a wire message into its type byte and decoded body
 * @throws Error on an empty buffer or an undecodable body
 */
export function decodePacket(data: Uint8Array): Packet {
	if (data.byteLength === 0) {
		throw new Error("Cannot decode an empty packet");
	}

	const type = data[0];
	if (data.byteLength === 1) {
		return { type, payload: undefined };
	}

	return { type, payload: packr.unpack(data.subarray(1)) };
}
