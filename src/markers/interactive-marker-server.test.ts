import { describe, expect, test, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { InteractiveMarkerServer } from "./interactive-marker-server";
import {
	createFeedback,
	createHeader,
	createInteractiveMarker,
	createPose,
	DEFAULT_FEEDBACK_CB,
	FeedbackType,
	UpdateType,
	type InteractiveMarkerFeedback,
	type InteractiveMarkerUpdate,
} from "./types";

function makeMarker(name: string, description = "") {
	return createInteractiveMarker({
		name,
		description,
		header: { frameId: "base_link" },
	});
}

describe("InteractiveMarkerServer", () => {
	let server: InteractiveMarkerServer;
	let published: InteractiveMarkerUpdate[];
	let warnSpy: MockInstance<typeof console.warn>;

	beforeEach(() => {
		server = new InteractiveMarkerServer({ topicNamespace: "test_server" });
		published = [];
		server.onUpdate((update) => published.push(update));
		warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("applyChanges", () => {
		test("should publish inserted markers as full records", () => {
			const marker = makeMarker("a", "box");
			server.insert(marker);

			const update = server.applyChanges();

			expect(update).toEqual({
				serverId: "test_server",
				seqNum: 1,
				type: UpdateType.UPDATE,
				markers: [marker],
				poses: [],
				erases: [],
			});
			expect(published).toHaveLength(1);
			expect(server.size()).toBe(1);
			expect(server.get("a")).toEqual(marker);
		});

		test("should follow insert, pose and erase through three flushes", () => {
			const d1 = makeMarker("a");
			const p2 = createPose({ position: { x: 2 } });
			const p3 = createPose({ position: { x: 3 } });

			server.insert(d1);
			server.applyChanges();
			expect(published[0].seqNum).toBe(1);
			expect(published[0].markers).toEqual([d1]);
			expect(server.size()).toBe(1);

			expect(server.setPose("a", p2)).toBe(true);
			expect(server.setPose("a", p3)).toBe(true);
			server.applyChanges();
			expect(published[1].seqNum).toBe(2);
			expect(published[1].markers).toEqual([]);
			expect(published[1].poses).toEqual([{ name: "a", header: d1.header, pose: p3 }]);

			expect(server.erase("a")).toBe(true);
			server.applyChanges();
			expect(published[2].seqNum).toBe(3);
			expect(published[2].erases).toEqual(["a"]);
			expect(server.size()).toBe(0);
			expect(server.get("a")).toBeUndefined();
		});

		test("should not publish or advance the sequence when nothing is staged", () => {
			expect(server.applyChanges()).toBeUndefined();
			expect(published).toHaveLength(0);
			expect(server.getSequenceNumber()).toBe(0);

			server.insert(makeMarker("a"));
			server.applyChanges();
			expect(server.applyChanges()).toBeUndefined();
			expect(server.getSequenceNumber()).toBe(1);
		});

		test("should emit one record per marker with the last write winning", () => {
			server.insert(makeMarker("a"));
			server.insert(makeMarker("b"));
			server.applyChanges();

			server.setPose("a", createPose({ position: { y: 1 } }));
			server.erase("a");
			server.insert(makeMarker("b", "second"));
			server.setPose("b", createPose({ position: { y: 5 } }));
			const update = server.applyChanges();

			expect(update?.erases).toEqual(["a"]);
			expect(update?.markers).toEqual([]);
			expect(update?.poses).toEqual([
				{ name: "b", header: createHeader({ frameId: "base_link" }), pose: createPose({ position: { y: 5 } }) },
			]);
			expect(server.get("b")?.description).toBe("");
		});

		test("should drop a pose written over an insert that was never committed", () => {
			server.insert(makeMarker("a"));
			expect(server.setPose("a", createPose({ position: { z: 7 } }))).toBe(true);

			expect(server.get("a")).toBeUndefined();
			expect(server.applyChanges()).toBeUndefined();
			expect(server.size()).toBe(0);
			expect(warnSpy).toHaveBeenCalledWith(
				"[InteractiveMarkerServer] Pending pose update for non-existing marker 'a', dropping it"
			);
		});

		test("should publish an erase for a marker inserted and erased before a flush", () => {
			server.insert(makeMarker("a"));
			server.erase("a");

			const update = server.applyChanges();

			expect(update?.markers).toEqual([]);
			expect(update?.erases).toEqual(["a"]);
			expect(server.size()).toBe(0);
		});

		test("should drop pose updates for markers that were never committed", () => {
			server.insert(makeMarker("a"));
			server.erase("a");
			expect(server.setPose("a", createPose())).toBe(true);

			expect(server.applyChanges()).toBeUndefined();
			expect(published).toHaveLength(0);
			expect(server.getSequenceNumber()).toBe(0);
			expect(warnSpy).toHaveBeenCalledWith(
				"[InteractiveMarkerServer] Pending pose update for non-existing marker 'a', dropping it"
			);
		});

		test("should strictly increase sequence numbers", () => {
			for (let i = 0; i < 5; i++) {
				server.insert(makeMarker(`m${i}`));
				server.applyChanges();
			}

			expect(published.map((update) => update.seqNum)).toEqual([1, 2, 3, 4, 5]);
		});

		test("should keep publishing to other listeners when one throws", () => {
			const received: number[] = [];
			server.onUpdate(() => {
				throw new Error("socket closed");
			});
			server.onUpdate((update) => received.push(update.seqNum));

			server.insert(makeMarker("a"));
			server.applyChanges();

			expect(received).toEqual([1]);
			expect(server.size()).toBe(1);
			expect(warnSpy).toHaveBeenCalledWith("[InteractiveMarkerServer] Failed to publish update 1: Error: socket closed");
		});

		test("should stop delivering to unsubscribed listeners", () => {
			const received: number[] = [];
			const unsubscribe = server.onUpdate((update) => received.push(update.seqNum));

			server.insert(makeMarker("a"));
			server.applyChanges();
			unsubscribe();
			server.insert(makeMarker("b"));
			server.applyChanges();

			expect(received).toEqual([1]);
		});

		test("should defer a flush requested while publishing", () => {
			const order: number[] = [];
			server.onUpdate((update) => {
				order.push(update.seqNum);
				if (update.seqNum === 1) {
					server.insert(makeMarker("b"));
					expect(server.applyChanges()).toBeUndefined();
				}
			});

			server.insert(makeMarker("a"));
			const first = server.applyChanges();

			expect(first?.seqNum).toBe(1);
			expect(order).toEqual([1, 2]);
			expect(published.map((update) => update.markers[0].name)).toEqual(["a", "b"]);
			expect(server.size()).toBe(2);
		});
	});

	describe("staging", () => {
		test("should fail to set the pose of an unknown marker and stage nothing", () => {
			expect(server.setPose("ghost", createPose())).toBe(false);
			expect(server.get("ghost")).toBeUndefined();
			expect(server.applyChanges()).toBeUndefined();
		});

		test("should default the pose header to the committed header", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			server.setPose("a", createPose({ position: { x: 1 } }));

			expect(server.get("a")?.header.frameId).toBe("base_link");
		});

		test("should prefer the committed header over a staged one", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			server.setPose("a", createPose({ position: { x: 1 } }), createHeader({ frameId: "explicit" }));
			server.setPose("a", createPose({ position: { x: 2 } }));

			expect(server.get("a")?.header.frameId).toBe("base_link");
			expect(server.applyChanges()?.poses[0].header.frameId).toBe("base_link");
		});

		test("should use an explicit pose header", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			const header = createHeader({ frameId: "odom", stamp: { sec: 3 } });
			server.setPose("a", createPose(), header);
			const update = server.applyChanges();

			expect(update?.poses[0].header).toEqual(header);
			expect(server.get("a")?.header).toEqual(header);
		});

		test("should fail to erase an unknown marker", () => {
			expect(server.erase("ghost")).toBe(false);
			expect(server.applyChanges()).toBeUndefined();
		});

		test("should erase every committed marker on clear", () => {
			server.insert(makeMarker("a"));
			server.insert(makeMarker("b"));
			server.applyChanges();
			server.insert(makeMarker("c"));

			server.clear();
			const update = server.applyChanges();

			expect(update?.erases.sort()).toEqual(["a", "b"]);
			expect(update?.markers).toEqual([]);
			expect(server.size()).toBe(0);
			expect(server.empty()).toBe(true);
			expect(server.get("c")).toBeUndefined();
		});

		test("should not count staged markers in size", () => {
			server.insert(makeMarker("a"));

			expect(server.size()).toBe(0);
			expect(server.empty()).toBe(true);
			expect(server.has("a")).toBe(true);
			expect(server.getNames()).toEqual([]);
		});
	});

	describe("get", () => {
		test("should hide a marker with a pending erase", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.erase("a");

			expect(server.get("a")).toBeUndefined();
			expect(server.size()).toBe(1);
		});

		test("should return the staged definition of a pending full update", () => {
			server.insert(makeMarker("a", "old"));
			server.applyChanges();
			server.insert(makeMarker("a", "new"));

			expect(server.get("a")?.description).toBe("new");
		});

		test("should overlay a pending pose on the committed definition", () => {
			server.insert(makeMarker("a", "box"));
			server.applyChanges();
			server.setPose("a", createPose({ position: { x: 9 } }), createHeader({ frameId: "map" }));

			const marker = server.get("a");
			expect(marker?.description).toBe("box");
			expect(marker?.pose.position.x).toBe(9);
			expect(marker?.header.frameId).toBe("map");
		});

		test("should hide a pending pose without a committed marker", () => {
			server.insert(makeMarker("a"));
			server.erase("a");
			server.setPose("a", createPose());

			expect(server.get("a")).toBeUndefined();
		});

		test("should return copies", () => {
			server.insert(makeMarker("a", "box"));
			server.applyChanges();

			const copy = server.get("a");
			if (copy) {
				copy.description = "changed";
			}

			expect(server.get("a")?.description).toBe("box");
		});
	});

	describe("getInteractiveMarkers", () => {
		test("should return committed markers and the current sequence number only", () => {
			const a = makeMarker("a");
			server.insert(a);
			server.applyChanges();
			server.insert(makeMarker("b"));
			server.setPose("a", createPose({ position: { x: 4 } }));

			expect(server.getInteractiveMarkers()).toEqual({ sequenceNumber: 1, markers: [a] });
		});
	});

	describe("setCallback", () => {
		test("should fail for unknown markers", () => {
			expect(server.setCallback("ghost", () => {})).toBe(false);
		});

		test("should keep handlers staged before the flush", () => {
			const received: InteractiveMarkerFeedback[] = [];
			server.insert(makeMarker("a"));
			server.setCallback("a", (feedback) => received.push(feedback), DEFAULT_FEEDBACK_CB);
			server.applyChanges();

			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.BUTTON_CLICK }));

			expect(received).toHaveLength(1);
			expect(received[0].eventType).toBe(FeedbackType.BUTTON_CLICK);
		});

		test("should register handlers with insertWithCallback", () => {
			const clicks: string[] = [];
			server.insertWithCallback(
				makeMarker("a"),
				(feedback) => clicks.push(feedback.controlName),
				FeedbackType.BUTTON_CLICK
			);
			server.applyChanges();

			server.processFeedback(
				createFeedback({ markerName: "a", controlName: "button", eventType: FeedbackType.BUTTON_CLICK })
			);
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_UP }));

			expect(clicks).toEqual(["button"]);
		});

		test("should apply to both the committed marker and its staged update", () => {
			const calls: string[] = [];
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.setPose("a", createPose());

			server.setCallback("a", () => calls.push("default"));
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_DOWN }));
			server.applyChanges();
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_DOWN }));

			expect(calls).toEqual(["default", "default"]);
		});

		test("should remove a type-specific handler when called without a callback", () => {
			const calls: string[] = [];
			server.insert(makeMarker("a"));
			server.setCallback("a", () => calls.push("default"));
			server.setCallback("a", () => calls.push("click"), FeedbackType.BUTTON_CLICK);
			server.applyChanges();

			server.setCallback("a", undefined, FeedbackType.BUTTON_CLICK);
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.BUTTON_CLICK }));

			expect(calls).toEqual(["default"]);
		});

		test("should drop committed handlers when the marker is inserted again", () => {
			const calls: string[] = [];
			server.insertWithCallback(makeMarker("a"), () => calls.push("first"));
			server.applyChanges();

			server.insert(makeMarker("a", "redefined"));
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_UP }));
			server.applyChanges();
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_UP }));

			expect(calls).toEqual(["first"]);
		});
	});

	describe("processFeedback", () => {
		test("should drop feedback for unknown markers without touching state", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			const accepted = server.processFeedback(
				createFeedback({ markerName: "ghost", eventType: FeedbackType.POSE_UPDATE })
			);

			expect(accepted).toBe(false);
			expect(server.size()).toBe(1);
			expect(server.get("ghost")).toBeUndefined();
			expect(server.applyChanges()).toBeUndefined();
			expect(warnSpy).toHaveBeenCalledWith("[InteractiveMarkerServer] Received feedback for unknown marker 'ghost', ignoring");
		});

		test("should record the time and client of the last feedback", () => {
			vi.spyOn(Date, "now").mockReturnValue(1_700_000_000_000);
			server.insert(makeMarker("a"));
			server.applyChanges();

			expect(server.getFeedbackInfo("a")).toEqual({ lastFeedback: undefined, lastClientId: "" });

			server.processFeedback(createFeedback({ markerName: "a", clientId: "viewer-1" }));

			expect(server.getFeedbackInfo("a")).toEqual({ lastFeedback: 1_700_000_000_000, lastClientId: "viewer-1" });
			expect(server.getFeedbackInfo("ghost")).toBeUndefined();
		});

		test("should stage a pose update from pose feedback", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			const pose = createPose({ position: { x: 1.5, y: -2 } });
			const header = createHeader({ frameId: "base_link", stamp: { sec: 10, nanosec: 5 } });
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.POSE_UPDATE, pose, header }));

			expect(server.get("a")?.pose).toEqual(pose);
			const update = server.applyChanges();
			expect(update?.poses).toEqual([{ name: "a", header, pose }]);
		});

		test("should not stage anything for other event types", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			server.processFeedback(
				createFeedback({ markerName: "a", eventType: FeedbackType.MOUSE_DOWN, pose: createPose({ position: { x: 8 } }) })
			);

			expect(server.applyChanges()).toBeUndefined();
		});

		test("should fall back to the default handler and prefer type-specific ones", () => {
			const calls: Array<[string, number]> = [];
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.setCallback("a", (feedback) => calls.push(["default", feedback.eventType]), DEFAULT_FEEDBACK_CB);
			server.setCallback("a", (feedback) => calls.push(["menu", feedback.eventType]), FeedbackType.MENU_SELECT);

			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.MENU_SELECT }));
			server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.POSE_UPDATE }));
			server.processFeedback(createFeedback({ markerName: "a", eventType: 42 }));

			expect(calls).toEqual([
				["menu", FeedbackType.MENU_SELECT],
				["default", FeedbackType.POSE_UPDATE],
				["default", 42],
			]);
		});

		test("should accept feedback without any handler", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();

			expect(server.processFeedback(createFeedback({ markerName: "a", eventType: FeedbackType.BUTTON_CLICK }))).toBe(true);
		});

		test("should let handlers call back into the server", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.setCallback("a", (feedback) => {
				const snapped = createPose({ position: { x: Math.round(feedback.pose.position.x) } });
				expect(server.setPose(feedback.markerName, snapped)).toBe(true);
				expect(server.getFeedbackInfo("a")?.lastClientId).toBe("viewer");
			});

			server.processFeedback(
				createFeedback({
					markerName: "a",
					clientId: "viewer",
					eventType: FeedbackType.POSE_UPDATE,
					pose: createPose({ position: { x: 2.4 } }),
				})
			);

			expect(server.get("a")?.pose.position.x).toBe(2);
			expect(server.applyChanges()?.poses).toHaveLength(1);
		});

		test("should survive a throwing handler", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.setCallback("a", () => {
				throw new Error("boom");
			});

			expect(server.processFeedback(createFeedback({ markerName: "a", clientId: "viewer" }))).toBe(true);
			expect(server.getFeedbackInfo("a")?.lastClientId).toBe("viewer");
			expect(warnSpy).toHaveBeenCalledWith("[InteractiveMarkerServer] Error in feedback handler for marker 'a': Error: boom");
		});

		test("should hand handlers a copy of the feedback", () => {
			server.insert(makeMarker("a"));
			server.applyChanges();
			server.setCallback("a", (feedback) => {
				feedback.pose.position.x = 100;
			});

			const feedback = createFeedback({ markerName: "a", eventType: FeedbackType.POSE_UPDATE });
			server.processFeedback(feedback);

			expect(feedback.pose.position.x).toBe(0);
			expect(server.get("a")?.pose.position.x).toBe(0);
		});
	});
});
