import { assignHandler, cloneHandlers, createHandlers, type FeedbackCallback, type FeedbackHandlers } from "./handlers";
import { createInteractiveMarker, type Header, type InteractiveMarker, type Pose } from "./types";

/**
 * Kind of staged change
 * - `full`: the whole definition is replaced (or created)
 * - `pose`: only pose and header change
 * - `erase`: the marker is removed
 */
export type PendingKind = "full" | "pose" | "erase";

/**
 * A staged, not yet published change to one marker.
 *
 * For `pose` slots only `marker.pose` and `marker.header` are meaningful;
 * for `erase` slots `marker` is a placeholder.
 */
export interface PendingUpdate {
	kind: PendingKind;
	marker: InteractiveMarker;
	handlers: FeedbackHandlers;
}

/**
 * Single-slot-per-name buffer of staged updates.
 *
 * Every write to a name that already has a slot is merged into that slot:
 *
 * | staged \ new | full            | pose                      | erase |
 * |--------------|-----------------|---------------------------|-------|
 * | none         | full            | pose                      | erase |
 * | full         | full (replaced) | pose, handlers kept       | erase |
 * | pose         | full (replaced) | pose, pose/header updated | erase |
 * | erase        | full (replaced) | pose, handlers kept       | erase |
 *
 * The last write decides the kind of the slot. Replacing writes (`full`,
 * `erase`) drop handlers staged on the previous slot.
 */
export class PendingUpdates {
	private slots = new Map<string, PendingUpdate>();

	get size(): number {
		return this.slots.size;
	}

	has(name: string): boolean {
		return this.slots.has(name);
	}

	/**
	 * Read a staged slot. Returns a copy of the definition; handler callbacks are shared.
	 */
	get(name: string): PendingUpdate | undefined {
		const slot = this.slots.get(name);
		if (!slot) {
			return undefined;
		}
		return {
			kind: slot.kind,
			marker: structuredClone(slot.marker),
			handlers: cloneHandlers(slot.handlers),
		};
	}

	stageFull(marker: InteractiveMarker): void {
		this.slots.set(marker.name, {
			kind: "full",
			marker: structuredClone(marker),
			handlers: createHandlers(),
		});
	}

	stagePose(name: string, pose: Pose, header: Header): void {
		let slot = this.slots.get(name);
		if (!slot) {
			slot = {
				kind: "pose",
				marker: createInteractiveMarker({ name }),
				handlers: createHandlers(),
			};
			this.slots.set(name, slot);
		} else {
			slot.kind = "pose";
		}

		slot.marker.pose = structuredClone(pose);
		slot.marker.header = structuredClone(header);
	}

	stageErase(name: string): void {
		this.slots.set(name, {
			kind: "erase",
			marker: createInteractiveMarker({ name }),
			handlers: createHandlers(),
		});
	}

	/**
	 * Apply a handler change to an existing slot
	 * @returns false if nothing is staged for `name`
	 */
	setHandler(name: string, eventType: number, callback: FeedbackCallback | undefined): boolean {
		const slot = this.slots.get(name);
		if (!slot) {
			return false;
		}
		assignHandler(slot.handlers, eventType, callback);
		return true;
	}

	clear(): void {
		this.slots.clear();
	}

	/**
	 * Take every staged slot and leave the buffer empty.
	 * Writes made after this call land in the emptied buffer.
	 */
	drain(): Map<string, PendingUpdate> {
		const drained = this.slots;
		this.slots = new Map();
		return drained;
	}
}
