import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { TerminalIO } from "../TerminalIO.js";

const createIO = () => {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf8");
  });
  return { input, io: new TerminalIO(input, output), written: () => written };
};

test("TerminalIO answers each question from piped input in order", { concurrency: false }, async () => {
  const { input, io } = createIO();
  input.end("m\nDoes a.\n\na\n");

  const answers: Array<string | undefined> = [];
  for (let index = 0; index < 5; index += 1) {
    answers.push(await io.ask("> "));
  }

  assert.deepEqual(answers, ["m", "Does a.", "", "a", undefined]);
});

test("TerminalIO keeps answering undefined after input ends", { concurrency: false }, async () => {
  const { input, io } = createIO();
  input.end("q\n");

  assert.equal(await io.ask("> "), "q");
  assert.equal(await io.ask("> "), undefined);
  assert.equal(await io.ask("> "), undefined);
});

test("TerminalIO waits for lines typed after the question", { concurrency: false }, async () => {
  const { input, io, written } = createIO();
  const pending = io.ask("(s)kip > ");
  input.write("s\n");

  assert.equal(await pending, "s");
  assert.ok(written().startsWith("(s)kip > "));
  io.close();
  assert.equal(await io.ask("> "), undefined);
});
