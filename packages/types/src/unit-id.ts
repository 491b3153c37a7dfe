/**
 * Unit identifiers.
 *
 * A unit ID is a 32-byte unit part followed by a one-byte type tag that
 * names the unit class (fungible type, NFT, fee credit record, ...).
 */

import { randomBytes } from "node:crypto";
import type { Hex } from "./hex.js";
import { fromHex, isHex, toHex } from "./hex.js";

export const UNIT_PART_LENGTH = 32;
export const TYPE_TAG_LENGTH = 1;
export const UNIT_ID_LENGTH = UNIT_PART_LENGTH + TYPE_TAG_LENGTH;

/** Type tags appended to the unit part. */
export const UnitTag = {
  FungibleTokenType: 0x20,
  FungibleToken: 0x21,
  NonFungibleTokenType: 0x22,
  NonFungibleToken: 0x23,
  FeeCreditRecord: 0x2f,
} as const;

export type UnitTag = (typeof UnitTag)[keyof typeof UnitTag];

export function newUnitId(unitPart: Uint8Array, tag: UnitTag): Hex {
  if (unitPart.length !== UNIT_PART_LENGTH) {
    throw new RangeError(
      `unit part must be ${UNIT_PART_LENGTH} bytes, got ${unitPart.length}`,
    );
  }
  const id = new Uint8Array(UNIT_ID_LENGTH);
  id.set(unitPart, 0);
  id[UNIT_PART_LENGTH] = tag;
  return toHex(id);
}

export function randomUnitId(tag: UnitTag): Hex {
  return newUnitId(randomBytes(UNIT_PART_LENGTH), tag);
}

export function isUnitId(value: unknown): value is Hex {
  return isHex(value) && value.length === UNIT_ID_LENGTH * 2;
}

/**
 * Read the type tag of a unit ID, or undefined when the value is not a
 * well-formed unit ID.
 */
export function unitTagOf(id: Hex): number | undefined {
  if (!isUnitId(id)) return undefined;
  return fromHex(id)[UNIT_PART_LENGTH];
}

export function hasUnitTag(id: Hex, tag: UnitTag): boolean {
  return unitTagOf(id) === tag;
}

/** Render a tag the way error messages show it: `0x20`. */
export function formatUnitTag(tag: number): string {
  return `0x${tag.toString(16).padStart(2, "0")}`;
}
