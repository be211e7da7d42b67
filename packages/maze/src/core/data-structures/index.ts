/**
 * Data structures shared by the generator and the search
 */

export {
  CoordSet,
  coordFromKey,
  coordKey,
  FastQueue,
} from "./fast-queue";
export { MinHeap, type MinHeapCompare } from "./min-heap";
