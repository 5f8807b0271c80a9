export { sleep, throwIfAborted } from "./sleep";
