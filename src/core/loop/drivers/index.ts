export { TimeoutDriver } from "./timeout";
