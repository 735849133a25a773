/**
 * Small ASN.1 and byte helpers shared by the CSR services
 */
import { isIPv4, isIPv6 } from "node:net";

import * as asn1js from "asn1js";

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new Uint8Array(bytes.byteLength);
  copy.set(bytes);
  return copy.buffer;
}

/**
 * DER named bit string: bit 0 is the most significant bit of the first byte,
 * trailing zero bits are dropped (X.690 11.2.2).
 */
export function encodeNamedBitString(names: readonly string[], set: Iterable<string>): asn1js.BitString {
  let highest = -1;
  const positions: number[] = [];
  for (const name of set) {
    const pos = names.indexOf(name);
    if (pos === -1) throw new Error(`Unknown bit name ${name}`);
    positions.push(pos);
    highest = Math.max(highest, pos);
  }

  if (highest === -1) {
    return new asn1js.BitString({ valueHex: new ArrayBuffer(0), unusedBits: 0 });
  }

  const bytes = new Uint8Array(Math.floor(highest / 8) + 1);
  for (const pos of positions) {
    bytes[pos >> 3] |= 0x80 >> (pos & 7);
  }
  const unusedBits = bytes.length * 8 - (highest + 1);

  return new asn1js.BitString({ valueHex: bytes.buffer, unusedBits });
}

export function decodeNamedBitString(names: readonly string[], bits: asn1js.BitString): Set<string> {
  const bytes = bits.valueBlock.valueHexView;
  const bitCount = bytes.length * 8 - bits.valueBlock.unusedBits;
  const out = new Set<string>();
  for (let pos = 0; pos < bitCount && pos < names.length; pos++) {
    if (bytes[pos >> 3] & (0x80 >> (pos & 7))) {
      out.add(names[pos]);
    }
  }
  return out;
}

/** Textual IPv4/IPv6 address → network-order bytes; null when not an address */
export function ipToBytes(ip: string): Uint8Array | null {
  if (isIPv4(ip)) {
    return new Uint8Array(ip.split(".").map((part) => Number(part)));
  }
  if (!isIPv6(ip)) return null;

  let text = ip;
  const v4Tail: number[] = [];
  // Embedded IPv4 suffix, e.g. ::ffff:192.0.2.1
  if (text.includes(".")) {
    const idx = text.lastIndexOf(":");
    const [a, b, c, d] = text
      .slice(idx + 1)
      .split(".")
      .map((part) => Number(part));
    v4Tail.push((a << 8) | b, (c << 8) | d);
    text = text.slice(0, idx + 1);
    if (!text.endsWith("::")) text = text.slice(0, -1);
  }

  const parse = (part: string): number[] =>
    part ? part.split(":").map((g) => parseInt(g, 16)) : [];

  let groups: number[];
  if (text.includes("::")) {
    const [head, rest] = text.split("::");
    const headGroups = parse(head);
    const restGroups = parse(rest);
    const fill = 8 - v4Tail.length - headGroups.length - restGroups.length;
    groups = [...headGroups, ...new Array<number>(fill).fill(0), ...restGroups];
  } else {
    groups = parse(text);
  }
  groups.push(...v4Tail);

  const bytes = new Uint8Array(16);
  groups.forEach((g, i) => {
    bytes[i * 2] = (g >> 8) & 0xff;
    bytes[i * 2 + 1] = g & 0xff;
  });
  return bytes;
}

/** Network-order bytes → IPv4 dotted or RFC 5952 IPv6 text */
export function bytesToIp(bytes: Uint8Array): string {
  if (bytes.length === 4) {
    return Array.from(bytes).join(".");
  }
  if (bytes.length !== 16) {
    return Buffer.from(bytes).toString("hex");
  }

  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push((bytes[i] << 8) | bytes[i + 1]);
  }

  // Longest run of two or more zero groups, first one wins on ties
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLen < 2) return hex.join(":");

  const left = hex.slice(0, bestStart).join(":");
  const right = hex.slice(bestStart + bestLen).join(":");
  return `${left}::${right}`;
}
