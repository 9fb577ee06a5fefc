/**
 * Line protocol spoken by node processes on stdin/stdout.
 *
 * Every message is one newline-terminated line of comma-separated fields.
 * @module
 */

import type {
  NodeOutput,
  NodeState,
  NodeStateEntry,
} from "./types.ts";

// ============================================================================
// Protocol Constants
// ============================================================================

/** Command delivering a packet to a node: `network_receive_packet,<HEX>` */
export const CMD_RECEIVE_PACKET = "network_receive_packet";

/** Command asking a node for its view: `get_state` */
export const CMD_GET_STATE = "get_state";

/** Push line a node emits to transmit: `transmit_packet,<LEN>,<HEX>` */
export const PUSH_TRANSMIT_PACKET = "transmit_packet";

/** Field separator */
export const FIELD_SEPARATOR = ",";

/** Number of fields per neighbour entry in a state response */
const STATE_ENTRY_FIELDS = 4;

// ============================================================================
// Outbound
// ============================================================================

/**
 * Build the command that hands a packet to a node.
 */
export function receivePacketCommand(hexData: string): string {
  return `${CMD_RECEIVE_PACKET}${FIELD_SEPARATOR}${hexData}`;
}

// ============================================================================
// Inbound
// ============================================================================

/**
 * Split off the first `count` fields; the last element keeps the remainder,
 * separators included.
 */
export function splitFields(line: string, count: number): string[] {
  const fields: string[] = [];
  let rest = line;
  while (fields.length < count - 1) {
    const at = rest.indexOf(FIELD_SEPARATOR);
    if (at < 0) break;
    fields.push(rest.slice(0, at));
    rest = rest.slice(at + 1);
  }
  fields.push(rest);
  return fields;
}

/**
 * Classify one stdout line of a node.
 *
 * Only `transmit_packet` is a push; anything else is an opaque response.
 */
export function classifyLine(line: string): NodeOutput {
  const [command, length, hexData] = splitFields(line, 3);
  if (command !== PUSH_TRANSMIT_PACKET) {
    return { kind: "response", line };
  }

  if (hexData === undefined) {
    return { kind: "malformed", line, reason: "missing payload field" };
  }

  const declared = Number.parseInt(length ?? "", 10);
  return {
    kind: "push",
    packet: {
      declaredLength: Number.isNaN(declared) ? null : declared,
      hexData,
    },
  };
}

/**
 * Check whether a response line answers `get_state`.
 */
export function isStateResponse(line: string): boolean {
  return splitFields(line, 2)[0] === CMD_GET_STATE;
}

/**
 * Parse `get_state,<uptime_ms>,<name>,<ts>,<lat>,<lon>,...`.
 *
 * Returns `null` for lines that are not state responses. A trailing
 * incomplete entry is ignored.
 */
export function parseStateResponse(line: string): NodeState | null {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields[0] !== CMD_GET_STATE || fields.length < 2) {
    return null;
  }

  const data = fields.slice(2);
  const entries: NodeStateEntry[] = [];
  for (let i = 0; i + STATE_ENTRY_FIELDS <= data.length; i += STATE_ENTRY_FIELDS) {
    const [name, timestamp, latitude, longitude] = data.slice(
      i,
      i + STATE_ENTRY_FIELDS,
    );
    entries.push({
      name: name ?? "",
      timestamp: timestamp ?? "",
      latitude: latitude ?? "",
      longitude: longitude ?? "",
    });
  }

  return { uptimeMs: fields[1] ?? "", entries };
}
