import { describe, expect, test, beforeEach } from "vitest";
import { PendingUpdates } from "./pending-updates";
import { createHeader, createInteractiveMarker, createPose, DEFAULT_FEEDBACK_CB, FeedbackType } from "./types";

describe("PendingUpdates", () => {
	let pending: PendingUpdates;

	beforeEach(() => {
		pending = new PendingUpdates();
	});

	test("should stage a full update keyed by marker name", () => {
		pending.stageFull(createInteractiveMarker({ name: "a", description: "first" }));

		const slot = pending.get("a");
		expect(pending.size).toBe(1);
		expect(slot?.kind).toBe("full");
		expect(slot?.marker.description).toBe("first");
	});

	test("should keep one slot per name", () => {
		pending.stageFull(createInteractiveMarker({ name: "a" }));
		pending.stagePose("a", createPose({ position: { x: 1 } }), createHeader());
		pending.stageErase("a");
		pending.stageFull(createInteractiveMarker({ name: "a", description: "again" }));

		expect(pending.size).toBe(1);
		expect(pending.get("a")?.kind).toBe("full");
		expect(pending.get("a")?.marker.description).toBe("again");
	});

	test("should turn a staged full update into a pose update", () => {
		pending.stageFull(createInteractiveMarker({ name: "a", description: "box" }));
		pending.stagePose("a", createPose({ position: { x: 2 } }), createHeader({ frameId: "map" }));

		const slot = pending.get("a");
		expect(pending.size).toBe(1);
		expect(slot?.kind).toBe("pose");
		expect(slot?.marker.pose.position.x).toBe(2);
		expect(slot?.marker.header.frameId).toBe("map");
	});

	test("should overwrite a staged pose with the latest pose", () => {
		pending.stagePose("a", createPose({ position: { x: 1 } }), createHeader({ frameId: "one" }));
		pending.stagePose("a", createPose({ position: { x: 3 } }), createHeader({ frameId: "two" }));

		const slot = pending.get("a");
		expect(slot?.kind).toBe("pose");
		expect(slot?.marker.pose.position.x).toBe(3);
		expect(slot?.marker.header.frameId).toBe("two");
	});

	test("should turn a staged erase into a pose update", () => {
		pending.stageErase("a");
		pending.stagePose("a", createPose({ position: { z: 4 } }), createHeader());

		expect(pending.get("a")?.kind).toBe("pose");
		expect(pending.get("a")?.marker.pose.position.z).toBe(4);
	});

	test("should drop staged handlers when a full update replaces the slot", () => {
		const handler = () => {};
		pending.stageFull(createInteractiveMarker({ name: "a" }));
		pending.setHandler("a", DEFAULT_FEEDBACK_CB, handler);

		pending.stageFull(createInteractiveMarker({ name: "a" }));

		expect(pending.get("a")?.handlers.defaultHandler).toBeUndefined();
	});

	test("should drop staged handlers when erased", () => {
		pending.stageFull(createInteractiveMarker({ name: "a" }));
		pending.setHandler("a", FeedbackType.BUTTON_CLICK, () => {});

		pending.stageErase("a");

		expect(pending.get("a")?.handlers.byEventType.size).toBe(0);
	});

	test("should keep staged handlers when a pose replaces a full update", () => {
		const handler = () => {};
		pending.stageFull(createInteractiveMarker({ name: "a" }));
		pending.setHandler("a", FeedbackType.MOUSE_DOWN, handler);

		pending.stagePose("a", createPose(), createHeader());

		expect(pending.get("a")?.handlers.byEventType.get(FeedbackType.MOUSE_DOWN)).toBe(handler);
	});

	test("should refuse handlers for names with nothing staged", () => {
		expect(pending.setHandler("missing", DEFAULT_FEEDBACK_CB, () => {})).toBe(false);
		expect(pending.size).toBe(0);
	});

	test("should not expose staged definitions by reference", () => {
		const marker = createInteractiveMarker({ name: "a", description: "original" });
		pending.stageFull(marker);
		marker.description = "mutated after staging";

		const slot = pending.get("a");
		expect(slot?.marker.description).toBe("original");

		if (slot) {
			slot.marker.description = "mutated copy";
		}
		expect(pending.get("a")?.marker.description).toBe("original");
	});

	test("should drain every slot and start empty", () => {
		pending.stageFull(createInteractiveMarker({ name: "a" }));
		pending.stageErase("b");

		const drained = pending.drain();

		expect(Array.from(drained.keys())).toEqual(["a", "b"]);
		expect(pending.size).toBe(0);

		pending.stageErase("c");
		expect(drained.has("c")).toBe(false);
	});
});
