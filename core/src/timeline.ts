/**
 * Timeline loading: `<timestamp>,<destination|-1>,<payload>` per line.
 * @module
 */

import { readFile } from "node:fs/promises";

import { TimelineError } from "./errors.ts";
import { splitFields } from "./protocol.ts";
import type { TimelineEvent } from "./types.ts";

const COMMENT_MARKER = "#";

/** Result of parsing a timeline source. */
export interface ParsedTimeline {
  /** Events in non-decreasing timestamp order */
  readonly events: readonly TimelineEvent[];
  /** Lines that were skipped, with the reason */
  readonly issues: readonly TimelineError[];
}

/**
 * Parse a timeline.
 *
 * Text after `#` is a comment; blank lines are ignored. Malformed lines are
 * collected in `issues` and skipped. Events are stably sorted by timestamp,
 * so equal timestamps keep their file order.
 */
export function parseTimeline(source: string): ParsedTimeline {
  const events: TimelineEvent[] = [];
  const issues: TimelineError[] = [];

  source.split(/\r?\n/).forEach((raw, index) => {
    const lineNo = index + 1;
    const commentAt = raw.indexOf(COMMENT_MARKER);
    const line = (commentAt >= 0 ? raw.slice(0, commentAt) : raw).trim();
    if (line === "") return;

    const fields = splitFields(line, 3);
    if (fields.length < 3) {
      issues.push(
        new TimelineError(`Skipping malformed line ${lineNo}: ${line}`, lineNo),
      );
      return;
    }

    const [ts, destination, payload] = fields;
    const timestamp = Number(ts);
    if (ts.trim() === "" || !Number.isFinite(timestamp) || timestamp < 0) {
      issues.push(
        new TimelineError(`Invalid timestamp on line ${lineNo}: ${ts}`, lineNo),
      );
      return;
    }

    events.push({
      timestamp,
      destination: destination.trim(),
      payload,
      line: lineNo,
    });
  });

  events.sort((a, b) => a.timestamp - b.timestamp);
  return { events, issues };
}

/**
 * Read and parse a timeline file. Read failures propagate to the caller.
 */
export async function loadTimeline(path: string): Promise<ParsedTimeline> {
  const source = await readFile(path, "utf8");
  return parseTimeline(source);
}
