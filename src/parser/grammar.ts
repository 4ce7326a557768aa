/**
 * Raw fields captured from a sync progress log line, not yet validated
 */
export type SyncProgressFields = {
  grammar: string;
  time: string;
  current: string;
  target: string;
};

export type SyncProgressGrammar = {
  name: string;
  /** Must capture the named groups `time`, `current` and `target` */
  pattern: RegExp;
};

/**
 * Consensus client initial sync lines, tried in order. Height captures are loose: a malformed height on a
 * matching line reaches the parser, which reports it.
 */
export const syncProgressGrammars: SyncProgressGrammar[] = [
  {
    // time="2024-06-15 10:30:45.123" level=info msg="Processing block 0xabc. 5000/10000 ..." prefix=initial-sync
    name: "processing_block",
    pattern:
      /^time="(?<time>[^"]*)"\s+level=.*?msg="Processing block[^"]*?\s(?<current>[^\s/"]+)\/(?<target>[^\s/"]+)/,
  },
  {
    // time="2024-06-15 10:30:45" level=info msg="Processing blocks" latestProcessedSlot/currentSlot="3000/9000"
    name: "processed_slot",
    pattern: /^time="(?<time>[^"]*)"\s+level=.*?latestProcessedSlot\/currentSlot="(?<current>[^/"]*)\/(?<target>[^"]*)"/,
  },
];

/**
 * Returns the fields of the first grammar matching `line`, or null if the line is not a sync progress line
 */
export function matchSyncProgressLine(
  line: string,
  grammars: SyncProgressGrammar[] = syncProgressGrammars
): SyncProgressFields | null {
  for (const {name, pattern} of grammars) {
    const groups = pattern.exec(line)?.groups;
    if (groups?.time === undefined || groups.current === undefined || groups.target === undefined) {
      continue;
    }
    return {grammar: name, time: groups.time, current: groups.current, target: groups.target};
  }
  return null;
}
