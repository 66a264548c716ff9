/**
 * Gearman binary protocol constants.
 *
 * Every packet starts with a 12-byte header: a 4-byte magic marker
 * (`\0REQ` or `\0RES`), a big-endian packet type and a big-endian
 * payload length. Multi-field payloads separate fields with a NUL byte;
 * the last field is opaque and may itself contain NULs.
 */

/** Magic marker for packets sent to the job server. */
export const MAGIC_REQUEST: Buffer = Buffer.from([0x00, 0x52, 0x45, 0x51]);

/** Magic marker for packets sent by the job server. */
export const MAGIC_RESPONSE: Buffer = Buffer.from([0x00, 0x52, 0x45, 0x53]);

/** Fixed header size: magic (4) + command (4) + length (4). */
export const HEADER_LENGTH = 12;

/** Default job server port. */
export const DEFAULT_PORT = 4730;

/** Packet type codes, fixed by the protocol. */
export const Command = {
  CAN_DO: 1,
  CANT_DO: 2,
  RESET_ABILITIES: 3,
  PRE_SLEEP: 4,
  NOOP: 6,
  SUBMIT_JOB: 7,
  JOB_CREATED: 8,
  GRAB_JOB: 9,
  NO_JOB: 10,
  JOB_ASSIGN: 11,
  WORK_STATUS: 12,
  WORK_COMPLETE: 13,
  WORK_FAIL: 14,
  GET_STATUS: 15,
  ECHO_REQ: 16,
  ECHO_RES: 17,
  SUBMIT_JOB_BG: 18,
  ERROR: 19,
  STATUS_RES: 20,
  SUBMIT_JOB_HIGH: 21,
  SET_CLIENT_ID: 22,
  CAN_DO_TIMEOUT: 23,
  ALL_YOURS: 24,
  WORK_EXCEPTION: 25,
  OPTION_REQ: 26,
  OPTION_RES: 27,
  WORK_DATA: 28,
  WORK_WARNING: 29,
  GRAB_JOB_UNIQ: 30,
  JOB_ASSIGN_UNIQ: 31,
  SUBMIT_JOB_HIGH_BG: 32,
  SUBMIT_JOB_LOW: 33,
  SUBMIT_JOB_LOW_BG: 34,
} as const;

export type CommandName = keyof typeof Command;

/** One of the known packet type codes. */
export type CommandCode = (typeof Command)[CommandName];

const NAMES = new Map<number, string>(
  Object.entries(Command).map(([name, code]): [number, string] => [code, name]),
);

/**
 * Human-readable name for a packet type, e.g. `NO_JOB`.
 * Unrecognised codes render as `UNKNOWN(<code>)`.
 */
export function commandName(code: number): string {
  return NAMES.get(code) ?? `UNKNOWN(${code})`;
}
