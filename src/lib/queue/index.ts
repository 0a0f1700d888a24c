export type { SerialQueue } from "./serial-queue";
export { createSerialQueue } from "./serial-queue";
