export type { S3Sender } from "./store.js";
export { createS3ObjectStore, S3ObjectStore } from "./store.js";
