import {
    InteractiveMarkerServer,
    MarkerServerNetwork,
    WsServerTransport,
    combineValidators,
    createControl,
    createInteractiveMarker,
    createMarker,
    createPose,
    validateEventTypes,
    validatePoseFinite,
    FeedbackType,
    InteractionMode,
    MarkerType,
    type InteractiveMarker,
    type InteractiveMarkerFeedback,
} from "../../src";

const PORT = Number(process.env.PORT ?? 3007);

/**
 * A grey box that observers can drag along its x axis
 */
function makeSimpleMarker(): InteractiveMarker {
    const box = createMarker({
        type: MarkerType.CUBE,
        scale: { x: 0.45, y: 0.45, z: 0.45 },
        color: { r: 0, g: 0.5, b: 0.5, a: 1 },
    });

    return createInteractiveMarker({
        header: { frameId: "base_link" },
        name: "my_marker",
        description: "Simple 1-DoF Control",
        pose: createPose(),
        controls: [
            // Non-interactive control that only shows the box
            createControl({ alwaysVisible: true, markers: [box] }),
            createControl({ name: "move_x", interactionMode: InteractionMode.MOVE_AXIS }),
        ],
    });
}

const markers = new InteractiveMarkerServer({ topicNamespace: "simple_marker", debug: true });

const network = new MarkerServerNetwork({
    server: markers,
    transport: WsServerTransport.create({ port: PORT }),
    feedbackValidator: combineValidators(
        validateEventTypes(FeedbackType.POSE_UPDATE, FeedbackType.MOUSE_DOWN, FeedbackType.MOUSE_UP),
        validatePoseFinite()
    ),
    config: {
        publishInterval: 100,
        heartbeatInterval: 10000,
        heartbeatTimeout: 45000,
    },
});

network.onConnection((peerId) => {
    console.log(`Observer connected: ${peerId}`);
});

network.onDisconnection((peerId) => {
    console.log(`Observer disconnected: ${peerId}`);
});

markers.insertWithCallback(makeSimpleMarker(), (feedback: InteractiveMarkerFeedback) => {
    const { x, y, z } = feedback.pose.position;
    console.log(`${feedback.markerName} is now at ${x}, ${y}, ${z}.`);
});

// Published right away; later pose feedback goes out with the timed flush
markers.applyChanges();

console.log(`Marker server listening on ws://localhost:${PORT}`);

process.on("SIGINT", () => {
    console.log("Shutting down...");
    Promise.resolve(network.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            console.error(`Failed to close server: ${error}`);
            process.exit(1);
        });
});
