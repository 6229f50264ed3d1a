/**
 * Protocol Layer - wire packets and payload schemas
 *
 * Every message is one type byte followed by a MessagePack body. Bodies read
 * from the wire are parsed with the schemas below before anything else sees
 * them.
 *
 * @example
 * ```ts
 * import { decodePacket, encodePacket, FeedbackSchema } from './protocol';
 *
 * const bytes = encodePacket(MessageType.FEEDBACK, feedback);
 *
 * const packet = decodePacket(bytes);
 * const parsed = FeedbackSchema.safeParse(packet.payload);
 * if (parsed.success) {
 *   server.processFeedback(parsed.data);
 * }
 * ```
 */

export { encodePacket, decodePacket, type Packet } from "./packets";
export {
	TimeSchema,
	HeaderSchema,
	PointSchema,
	QuaternionSchema,
	PoseSchema,
	ColorSchema,
	MarkerSchema,
	ControlSchema,
	MenuEntrySchema,
	InteractiveMarkerSchema,
	InteractiveMarkerPoseSchema,
	UpdateSchema,
	FeedbackSchema,
	GetMarkersRequestSchema,
	GetMarkersResponseSchema,
	type GetMarkersRequest,
	type GetMarkersResponse,
} from "./schemas";
