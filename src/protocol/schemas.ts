import { z } from "zod";
import {
	InteractionMode,
	MarkerAction,
	MarkerType,
	MenuCommandType,
	OrientationMode,
	UpdateType,
	type ColorRGBA,
	type Header,
	type InteractiveMarker,
	type InteractiveMarkerControl,
	type InteractiveMarkerFeedback,
	type InteractiveMarkerPose,
	type InteractiveMarkerUpdate,
	type Marker,
	type MenuEntry,
	type Point,
	type Pose,
	type Quaternion,
	type Time,
} from "../markers/types";

export const TimeSchema: z.ZodType<Time> = z.object({
	sec: z.number().int(),
	nanosec: z.number().int().nonnegative(),
});

export const HeaderSchema: z.ZodType<Header> = z.object({
	stamp: TimeSchema,
	frameId: z.string(),
});

export const PointSchema: z.ZodType<Point> = z.object({
	x: z.number(),
	y: z.number(),
	z: z.number(),
});

export const QuaternionSchema: z.ZodType<Quaternion> = z.object({
	x: z.number(),
	y: z.number(),
	z: z.number(),
	w: z.number(),
});

export const PoseSchema: z.ZodType<Pose> = z.object({
	position: PointSchema,
	orientation: QuaternionSchema,
});

export const ColorSchema: z.ZodType<ColorRGBA> = z.object({
	r: z.number(),
	g: z.number(),
	b: z.number(),
	a: z.number(),
});

export const MarkerSchema: z.ZodType<Marker> = z.object({
	header: HeaderSchema,
	ns: z.string(),
	id: z.number().int(),
	type: z.nativeEnum(MarkerType),
	action: z.nativeEnum(MarkerAction),
	pose: PoseSchema,
	scale: PointSchema,
	color: ColorSchema,
	text: z.string(),
	meshResource: z.string(),
	points: z.array(PointSchema),
	colors: z.array(ColorSchema),
	frameLocked: z.boolean(),
});

export const ControlSchema: z.ZodType<InteractiveMarkerControl> = z.object({
	name: z.string(),
	orientation: QuaternionSchema,
	orientationMode: z.nativeEnum(OrientationMode),
	interactionMode: z.nativeEnum(InteractionMode),
	alwaysVisible: z.boolean(),
	markers: z.array(MarkerSchema),
	independentMarkerOrientation: z.boolean(),
	description: z.string(),
});

export const MenuEntrySchema: z.ZodType<MenuEntry> = z.object({
	id: z.number().int(),
	parentId: z.number().int(),
	title: z.string(),
	command: z.string(),
	commandType: z.nativeEnum(MenuCommandType),
});

export const InteractiveMarkerSchema: z.ZodType<InteractiveMarker> = z.object({
	header: HeaderSchema,
	pose: PoseSchema,
	name: z.string(),
	description: z.string(),
	scale: z.number(),
	menuEntries: z.array(MenuEntrySchema),
	controls: z.array(ControlSchema),
});

export const InteractiveMarkerPoseSchema: z.ZodType<InteractiveMarkerPose> = z.object({
	header: HeaderSchema,
	pose: PoseSchema,
	name: z.string(),
});

export const UpdateSchema: z.ZodType<InteractiveMarkerUpdate> = z.object({
	serverId: z.string(),
	seqNum: z.number().int().nonnegative(),
	type: z.nativeEnum(UpdateType),
	markers: z.array(InteractiveMarkerSchema),
	poses: z.array(InteractiveMarkerPoseSchema),
	erases: z.array(z.string()),
});

export const FeedbackSchema: z.ZodType<InteractiveMarkerFeedback> = z.object({
	header: HeaderSchema,
	clientId: z.string(),
	markerName: z.string(),
	controlName: z.string(),
	eventType: z.number().int().min(0).max(255),
	pose: PoseSchema,
	menuEntryId: z.number().int(),
	mousePoint: PointSchema,
	mousePointValid: z.boolean(),
});

/**
 * Observer -> server: ask for the committed markers
 */
export const GetMarkersRequestSchema = z.object({
	requestId: z.string(),
});

export type GetMarkersRequest = z.infer<typeof GetMarkersRequestSchema>;

/**
 * Server -> observer: committed markers and the sequence number they belong to
 */
export const GetMarkersResponseSchema = z.object({
	requestId: z.string(),
	sequenceNumber: z.number().int().nonnegative(),
	markers: z.array(InteractiveMarkerSchema),
});

export type GetMarkersResponse = z.infer<typeof GetMarkersResponseSchema>;
