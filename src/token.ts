/**
 * Token model.
 *
 * A tree is stored as a flat array of strings. The reserved sentinel
 * `ASCEND` marks a pop of the current path stack; every other string is a
 * component name. Tagged `Token` values are only built when a caller reads
 * the tokens back.
 */

export const ASCEND = "..";

export interface NameToken {
  readonly kind: "name";
  readonly name: string;
}

export interface AscendToken {
  readonly kind: "ascend";
}

export type Token = NameToken | AscendToken;

const ascendToken: AscendToken = Object.freeze({ kind: "ascend" });

export function isAscend(raw: string): boolean {
  return raw === ASCEND;
}

export function toToken(raw: string): Token {
  return isAscend(raw) ? ascendToken : { kind: "name", name: raw };
}
