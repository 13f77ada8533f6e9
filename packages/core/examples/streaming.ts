/**
 * @wary/core Streaming
 *
 * A caller-driven retry loop over a length-prefixed frame protocol. Bytes
 * arrive in arbitrary chunks; each attempt either yields a frame, asks for
 * more input (and says how much when it can), or rejects the stream.
 *
 * Frame layout: u16 big-endian payload length, then the payload.
 *
 * Run:   npx tsx examples/streaming.ts
 */

import assert from "node:assert/strict";

import { continueAfter, input, named, ok, type Parser, type Reader } from "../src/index.js";

// ============================================================================
// 1. THE GRAMMAR
// ============================================================================

const frame: Parser<Uint8Array, "bytes"> = named("read frame", (r: Reader<"bytes">) => {
  const length = r.context("read frame length", (h) => h.readU16Be());
  if (!length.ok) return length;
  const payload = r.context("read frame payload", (p) => p.take(length.value));
  if (!payload.ok) return payload;
  return ok(payload.value.asBytes().slice());
});

// ============================================================================
// 2. THE LOOP
// ============================================================================

type Step =
  | { kind: "frame"; payload: Uint8Array; consumed: number }
  | { kind: "need"; atLeast: number | undefined }
  | { kind: "reject"; message: string };

function step(buffer: Uint8Array): Step {
  const result = input(buffer).readPartial(frame);
  if (result.ok) {
    const [payload, rest] = result.value;
    return { kind: "frame", payload, consumed: rest.offset };
  }
  const requirement = result.error.retryRequirement();
  if (requirement === null) return { kind: "reject", message: result.error.toString() };
  return { kind: "need", atLeast: continueAfter(requirement) };
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

// ============================================================================
// 3. FEEDING CHUNKS
// ============================================================================

const chunks = [
  Uint8Array.of(0x00),
  Uint8Array.of(0x03, 0x61),
  Uint8Array.of(0x62, 0x63, 0x00, 0x01),
  Uint8Array.of(0x7a),
];

const frames: string[] = [];
const requests: (number | undefined)[] = [];
let buffer: Uint8Array = new Uint8Array(0);

for (const chunk of chunks) {
  buffer = concat(buffer, chunk);
  for (;;) {
    const next = step(buffer);
    if (next.kind === "frame") {
      frames.push(new TextDecoder().decode(next.payload));
      buffer = buffer.slice(next.consumed);
      continue;
    }
    if (next.kind === "need") requests.push(next.atLeast);
    if (next.kind === "reject") throw new Error(next.message);
    break;
  }
}

assert.deepEqual(frames, ["abc", "z"]);
// Half a header, 2 of 3 payload bytes, a missing payload byte, an empty buffer
assert.deepEqual(requests, [1, 2, 1, 2]);

console.log(`frames: ${frames.join(", ")}`);
