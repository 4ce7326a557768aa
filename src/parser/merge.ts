import {Sample} from "./interface.js";

/**
 * Merge the samples of several log files into a single sequence ordered by timestamp.
 * Samples with equal timestamps keep their file order, then their line order.
 */
export function mergeSamplesByTime(sequences: readonly (readonly Sample[])[]): Sample[] {
  // Array.prototype.sort is stable
  return sequences.flat().sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}
