/**
 * Message shapes for interactive markers, their diffs and observer feedback
 */

export interface Time {
	sec: number;
	nanosec: number;
}

export interface Header {
	stamp: Time;
	/** Coordinate frame the pose is expressed in */
	frameId: string;
}

export interface Point {
	x: number;
	y: number;
	z: number;
}

export type Vector3 = Point;

export interface Quaternion {
	x: number;
	y: number;
	z: number;
	w: number;
}

export interface Pose {
	position: Point;
	orientation: Quaternion;
}

export interface ColorRGBA {
	r: number;
	g: number;
	b: number;
	a: number;
}

/**
 * Visual primitive types understood by observers
 */
export enum MarkerType {
	ARROW = 0,
	CUBE = 1,
	SPHERE = 2,
	CYLINDER = 3,
	LINE_STRIP = 4,
	LINE_LIST = 5,
	CUBE_LIST = 6,
	SPHERE_LIST = 7,
	POINTS = 8,
	TEXT_VIEW_FACING = 9,
	MESH_RESOURCE = 10,
	TRIANGLE_LIST = 11,
}

export enum MarkerAction {
	ADD = 0,
	DELETE = 2,
	DELETEALL = 3,
}

/**
 * One visual element of a control
 */
export interface Marker {
	header: Header;
	ns: string;
	id: number;
	type: MarkerType;
	action: MarkerAction;
	pose: Pose;
	scale: Vector3;
	color: ColorRGBA;
	text: string;
	meshResource: string;
	points: Point[];
	colors: ColorRGBA[];
	frameLocked: boolean;
}

export enum OrientationMode {
	INHERIT = 0,
	FIXED = 1,
	VIEW_FACING = 2,
}

export enum InteractionMode {
	NONE = 0,
	MENU = 1,
	BUTTON = 2,
	MOVE_AXIS = 3,
	MOVE_PLANE = 4,
	ROTATE_AXIS = 5,
	MOVE_ROTATE = 6,
	MOVE_3D = 7,
	ROTATE_3D = 8,
	MOVE_ROTATE_3D = 9,
}

export interface InteractiveMarkerControl {
	name: string;
	orientation: Quaternion;
	orientationMode: OrientationMode;
	interactionMode: InteractionMode;
	alwaysVisible: boolean;
	markers: Marker[];
	independentMarkerOrientation: boolean;
	description: string;
}

export enum MenuCommandType {
	FEEDBACK = 0,
	ROSRUN = 1,
	ROSLAUNCH = 2,
}

export interface MenuEntry {
	id: number;
	/** 0 for top-level entries */
	parentId: number;
	title: string;
	command: string;
	commandType: MenuCommandType;
}

/**
 * Full definition of one marker. `name` is the registry key.
 */
export interface InteractiveMarker {
	header: Header;
	pose: Pose;
	name: string;
	description: string;
	scale: number;
	menuEntries: MenuEntry[];
	controls: InteractiveMarkerControl[];
}

/**
 * Pose-only record carried in a diff
 */
export interface InteractiveMarkerPose {
	header: Header;
	pose: Pose;
	name: string;
}

export enum UpdateType {
	/** Reserved, never produced by a flush */
	KEEP_ALIVE = 0,
	UPDATE = 1,
}

/**
 * One flush worth of changes
 */
export interface InteractiveMarkerUpdate {
	serverId: string;
	seqNum: number;
	type: UpdateType;
	/** Full definitions (created or replaced markers) */
	markers: InteractiveMarker[];
	/** Pose-only changes */
	poses: InteractiveMarkerPose[];
	/** Names of erased markers */
	erases: string[];
}

/**
 * Event type codes sent by observers
 */
export enum FeedbackType {
	KEEP_ALIVE = 0,
	POSE_UPDATE = 1,
	MENU_SELECT = 2,
	BUTTON_CLICK = 3,
	MOUSE_DOWN = 4,
	MOUSE_UP = 5,
}

/**
 * Event type passed to `setCallback` to address the default handler
 */
export const DEFAULT_FEEDBACK_CB = 255;

export interface InteractiveMarkerFeedback {
	header: Header;
	clientId: string;
	markerName: string;
	controlName: string;
	/** A {@link FeedbackType} code; unknown codes are routed to the default handler */
	eventType: number;
	pose: Pose;
	menuEntryId: number;
	mousePoint: Point;
	mousePointValid: boolean;
}

/**
 * Committed registry state as returned by the snapshot query
 */
export interface InteractiveMarkersSnapshot {
	sequenceNumber: number;
	markers: InteractiveMarker[];
}

export type DeepPartial<T> = {
	[K in keyof T]?: T[K] extends Array<infer U> ? U[] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export function createHeader(header: DeepPartial<Header> = {}): Header {
	return {
		stamp: { sec: header.stamp?.sec ?? 0, nanosec: header.stamp?.nanosec ?? 0 },
		frameId: header.frameId ?? "",
	};
}

export function createPose(pose: DeepPartial<Pose> = {}): Pose {
	return {
		position: {
			x: pose.position?.x ?? 0,
			y: pose.position?.y ?? 0,
			z: pose.position?.z ?? 0,
		},
		orientation: {
			x: pose.orientation?.x ?? 0,
			y: pose.orientation?.y ?? 0,
			z: pose.orientation?.z ?? 0,
			w: pose.orientation?.w ?? 1,
		},
	};
}

export function createMarker(marker: DeepPartial<Marker> = {}): Marker {
	return {
		header: createHeader(marker.header),
		ns: marker.ns ?? "",
		id: marker.id ?? 0,
		type: marker.type ?? MarkerType.ARROW,
		action: marker.action ?? MarkerAction.ADD,
		pose: createPose(marker.pose),
		scale: { x: marker.scale?.x ?? 0, y: marker.scale?.y ?? 0, z: marker.scale?.z ?? 0 },
		color: {
			r: marker.color?.r ?? 0,
			g: marker.color?.g ?? 0,
			b: marker.color?.b ?? 0,
			a: marker.color?.a ?? 0,
		},
		text: marker.text ?? "",
		meshResource: marker.meshResource ?? "",
		points: marker.points ?? [],
		colors: marker.colors ?? [],
		frameLocked: marker.frameLocked ?? false,
	};
}

export function createControl(control: DeepPartial<InteractiveMarkerControl> = {}): InteractiveMarkerControl {
	return {
		name: control.name ?? "",
		orientation: createPose({ orientation: control.orientation }).orientation,
		orientationMode: control.orientationMode ?? OrientationMode.INHERIT,
		interactionMode: control.interactionMode ?? InteractionMode.NONE,
		alwaysVisible: control.alwaysVisible ?? false,
		markers: control.markers ?? [],
		independentMarkerOrientation: control.independentMarkerOrientation ?? false,
		description: control.description ?? "",
	};
}

export function createInteractiveMarker(marker: DeepPartial<InteractiveMarker> = {}): InteractiveMarker {
	return {
		header: createHeader(marker.header),
		pose: createPose(marker.pose),
		name: marker.name ?? "",
		description: marker.description ?? "",
		scale: marker.scale ?? 1,
		menuEntries: marker.menuEntries ?? [],
		controls: marker.controls ?? [],
	};
}

export function createFeedback(feedback: DeepPartial<InteractiveMarkerFeedback> = {}): InteractiveMarkerFeedback {
	return {
		header: createHeader(feedback.header),
		clientId: feedback.clientId ?? "",
		markerName: feedback.markerName ?? "",
		controlName: feedback.controlName ?? "",
		eventType: feedback.eventType ?? FeedbackType.KEEP_ALIVE,
		pose: createPose(feedback.pose),
		menuEntryId: feedback.menuEntryId ?? 0,
		mousePoint: {
			x: feedback.mousePoint?.x ?? 0,
			y: feedback.mousePoint?.y ?? 0,
			z: feedback.mousePoint?.z ?? 0,
		},
		mousePointValid: feedback.mousePointValid ?? false,
	};
}
