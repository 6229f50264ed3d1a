import {
    InteractiveMarkerServer,
    MarkerServerNetwork,
    WsServerTransport,
    createControl,
    createInteractiveMarker,
    createMarker,
    createPose,
    TimeoutDriver,
    validatePoseFinite,
    FeedbackType,
    InteractionMode,
    MarkerType,
    OrientationMode,
    type InteractiveMarkerFeedback,
    type Point,
} from "../../src";

const PORT = Number(process.env.PORT ?? 3007);
const SIDE_LENGTH = 10;
const TICK_MS = 100;

/**
 * A 10x10x10 cube of draggable boxes. Dragging one box pulls its neighbours
 * along, weighted by distance.
 */
class CubeServer {
    markers = new InteractiveMarkerServer({ topicNamespace: "cube" });
    network: MarkerServerNetwork;
    positions: Point[] = [];

    constructor() {
        this.network = new MarkerServerNetwork({
            server: this.markers,
            transport: WsServerTransport.create({ port: PORT, maxPayload: 4 * 1024 * 1024 }),
            feedbackValidator: validatePoseFinite(),
            config: {
                // Every tick carries a pose for each box
                maxSendQueueSize: 20,
                heartbeatInterval: 10000,
                heartbeatTimeout: 45000,
            },
        });

        this.network.onConnection((peerId) => {
            console.log(`Observer connected: ${peerId} (${this.network.getPeerIds().length} total)`);
        });

        this.network.onDisconnection((peerId) => {
            console.log(`Observer disconnected: ${peerId}`);
        });

        this.makeCube();
        this.markers.applyChanges();
    }

    makeCube() {
        const step = 1 / SIDE_LENGTH;

        for (let i = 0; i < SIDE_LENGTH; i++) {
            const x = -0.5 + step * i;
            for (let j = 0; j < SIDE_LENGTH; j++) {
                const y = -0.5 + step * j;
                for (let k = 0; k < SIDE_LENGTH; k++) {
                    const z = step * k;
                    const name = String(this.positions.length);

                    const box = createMarker({
                        type: MarkerType.CUBE,
                        scale: { x: step, y: step, z: step },
                        color: { r: 0.65 + 0.7 * x, g: 0.65 + 0.7 * y, b: 0.65 + 0.7 * z, a: 1 },
                    });

                    const marker = createInteractiveMarker({
                        header: { frameId: "base_link" },
                        name,
                        scale: step,
                        pose: createPose({ position: { x, y, z } }),
                        controls: [
                            createControl({
                                alwaysVisible: true,
                                orientationMode: OrientationMode.VIEW_FACING,
                                interactionMode: InteractionMode.MOVE_PLANE,
                                independentMarkerOrientation: true,
                                markers: [box],
                            }),
                        ],
                    });

                    this.positions.push({ x, y, z });
                    this.markers.insertWithCallback(marker, (feedback) => this.processFeedback(feedback));
                }
            }
        }
    }

    processFeedback(feedback: InteractiveMarkerFeedback) {
        if (feedback.eventType !== FeedbackType.POSE_UPDATE) {
            return;
        }

        const index = Number.parseInt(feedback.markerName, 10);
        const dragged = this.positions[index];
        if (!dragged) {
            return;
        }

        const target = feedback.pose.position;
        const dx = target.x - dragged.x;
        const dy = target.y - dragged.y;
        const dz = target.z - dragged.z;

        this.positions.forEach((position, i) => {
            if (i === index) {
                return;
            }
            const distance = Math.hypot(target.x - position.x, target.y - position.y, target.z - position.z);
            const weight = Math.max(1 / (distance * 5 + 1) - 0.2, 0);

            position.x += weight * dx;
            position.y += weight * dy;
            position.z += weight * dz;
        });

        this.positions[index] = { ...target };
    }

    start() {
        console.log(`Cube server listening on ws://localhost:${PORT} with ${this.positions.length} markers`);

        // Publish every box position each tick
        const driver = new TimeoutDriver(() => {
            this.positions.forEach((position, i) => {
                this.markers.setPose(String(i), createPose({ position }));
            });
            this.markers.applyChanges();
        }, TICK_MS);
        driver.start();

        process.on("SIGINT", () => {
            driver.stop();
            Promise.resolve(this.network.close())
                .then(() => process.exit(0))
                .catch((error: unknown) => {
                    console.error(`Failed to close server: ${error}`);
                    process.exit(1);
                });
        });
    }
}

new CubeServer().start();
