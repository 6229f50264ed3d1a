import {
    MarkerClientNetwork,
    WsClientTransport,
    createPose,
    FeedbackType,
} from "../../src";

const SERVER_URL = process.env.SERVER_URL ?? `ws://localhost:${process.env.PORT ?? 3007}`;
const MARKER_NAME = process.env.MARKER ?? "my_marker";

/**
 * Mirrors the server's markers and drags one of them back and forth along x
 */
class Observer {
    client: MarkerClientNetwork;
    dragTimer: ReturnType<typeof setInterval> | null = null;
    startedAt = performance.now();

    constructor(transport: WsClientTransport) {
        this.client = new MarkerClientNetwork({
            transport,
            config: {
                // Full updates of large scenes exceed the default message size
                maxMessageSize: 4 * 1024 * 1024,
                heartbeatInterval: 10000,
                heartbeatTimeout: 45000,
            },
        });

        this.client.on("synchronized", (seq) => {
            console.log(`Synchronized at sequence ${seq} with ${this.client.getMarkers().length} markers`);
            this.startDragging();
        });

        this.client.on("markerUpdated", (marker) => {
            const { x, y, z } = marker.pose.position;
            console.log(`[seq ${this.client.getSequenceNumber()}] ${marker.name} at ${x.toFixed(3)}, ${y.toFixed(3)}, ${z.toFixed(3)}`);
        });

        this.client.on("markerErased", (name) => {
            console.log(`[seq ${this.client.getSequenceNumber()}] ${name} erased`);
        });

        this.client.onDisconnect(() => {
            console.log("Disconnected from server");
            this.stopDragging();
        });

        this.client.onError((error) => {
            console.error(`Transport error: ${error.message}`);
        });
    }

    startDragging() {
        if (this.dragTimer || !this.client.getMarker(MARKER_NAME)) {
            return;
        }

        this.dragTimer = setInterval(() => {
            const marker = this.client.getMarker(MARKER_NAME);
            if (!marker) {
                return;
            }

            const elapsed = (performance.now() - this.startedAt) / 1000;
            this.client.sendFeedback({
                markerName: MARKER_NAME,
                controlName: "move_x",
                eventType: FeedbackType.POSE_UPDATE,
                header: marker.header,
                pose: createPose({ position: { x: Math.sin(elapsed), y: marker.pose.position.y, z: marker.pose.position.z } }),
            });
        }, 500);
    }

    stopDragging() {
        if (this.dragTimer) {
            clearInterval(this.dragTimer);
            this.dragTimer = null;
        }
    }
}

WsClientTransport.connect(SERVER_URL)
    .then((transport) => {
        console.log(`Connected to ${SERVER_URL}`);
        new Observer(transport);
    })
    .catch((error: unknown) => {
        console.error(`Failed to connect to ${SERVER_URL}: ${error}`);
        process.exit(1);
    });
