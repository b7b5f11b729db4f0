/**
 * Tests for Stream over in-memory handles
 */

import { setTimeout as delay } from "node:timers/promises";
import { setFlagsFromString } from "node:v8";
import { runInNewContext } from "node:vm";
import {
  DetachedError,
  fromBytes,
  InputHandle,
  InvalidArgumentError,
  IOFailureError,
  MemoryHandle,
  OutputHandle,
  openStream,
  SeekWhence,
  Stream,
  type StreamHandle,
  toBytes,
  withStream,
} from "@bytehold/stream";
import { describe, expect, it, vi } from "vitest";

function tempHandle(mode: string, content?: string): StreamHandle {
  const handle = openStream("temp://", mode);
  if (content !== undefined) {
    handle.write(toBytes(content));
  }
  return handle;
}

function quietLogger() {
  return { debug: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

setFlagsFromString("--expose-gc");
const gc: unknown = runInNewContext("gc");

function collectGarbage(): void {
  if (typeof gc === "function") gc();
}

async function eventually(condition: () => boolean, attempts = 50): Promise<boolean> {
  for (let i = 0; i < attempts; i++) {
    collectGarbage();
    await delay(10);
    if (condition()) return true;
  }
  return condition();
}

function expectInert(stream: Stream, logger: ReturnType<typeof quietLogger>): void {
  expect(stream.isReadable()).toBe(false);
  expect(stream.isWritable()).toBe(false);
  expect(stream.isSeekable()).toBe(false);
  expect(stream.getSize()).toBeUndefined();
  expect(stream.getMetadata()).toEqual({});
  expect(stream.getMetadata("foo")).toBeUndefined();
  expect(stream.getMetadata("constructor")).toBeUndefined();

  const calls: Array<() => unknown> = [
    () => stream.read(10),
    () => stream.write("bar"),
    () => stream.seek(10),
    () => stream.tell(),
    () => stream.eof(),
    () => stream.getContents(),
  ];
  for (const call of calls) {
    expect(call).toThrow(DetachedError);
    expect(call).toThrow("Stream is detached");
  }

  expect(stream.toString()).toBe("");
  expect(logger.error).toHaveBeenCalledTimes(1);
  expect(logger.error.mock.calls[0][0]).toBe("Stream.toString exception: Stream is detached");
}

describe("Stream", () => {
  describe("construction", () => {
    it("rejects values that are not handles", () => {
      expect(() => Stream.from(true)).toThrow(InvalidArgumentError);
      expect(() => Stream.from("temp://")).toThrow("Stream must be a resource");
      expect(() => Stream.from({ mode: "r" })).toThrow(InvalidArgumentError);
    });

    it("rejects a closed handle", () => {
      const handle = tempHandle("r+");
      handle.close();
      expect(() => new Stream(handle)).toThrow(InvalidArgumentError);
    });

    it("wraps a live handle through Stream.from", () => {
      const handle = tempHandle("r+", "abc");
      const stream = Stream.from(handle);
      expect(stream.getSize()).toBe(3);
      stream.close();
    });

    it.each(["r+", "rb+"])("initializes properties from a %s handle", (mode) => {
      const stream = new Stream(tempHandle(mode, "data"));
      expect(stream.isReadable()).toBe(true);
      expect(stream.isWritable()).toBe(true);
      expect(stream.isSeekable()).toBe(true);
      expect(stream.getMetadata("uri")).toBe("temp://");
      expect(stream.getMetadata()).toEqual({
        timedOut: false,
        blocked: true,
        eof: false,
        wrapperType: "memory",
        streamType: "TEMP",
        mode,
        unreadBytes: 0,
        seekable: true,
        uri: "temp://",
      });
      expect(stream.getSize()).toBe(4);
      expect(stream.eof()).toBe(false);
      stream.close();
    });

    it("merges custom metadata over the handle's", () => {
      const stream = new Stream(tempHandle("r+"), { metadata: { hwm: 3, mode: "custom" } });
      expect(stream.getMetadata("hwm")).toBe(3);
      expect(stream.getMetadata("mode")).toBe("custom");
      expect(stream.getMetadata().uri).toBe("temp://");
      stream.close();
    });

    it("uses a size given in the options", () => {
      const stream = new Stream(tempHandle("r+", "abc"), { size: 10 });
      expect(stream.getSize()).toBe(10);
      stream.close();
    });
  });

  describe("string conversion", () => {
    it("converts to the full contents, repeatedly", () => {
      const stream = new Stream(tempHandle("w+", "data"));
      expect(stream.toString()).toBe("data");
      expect(stream.toString()).toBe("data");
      expect(`${stream}`).toBe("data");
      stream.close();
    });

    it("reads from the current position when the stream is not seekable", () => {
      const stream = new Stream(new InputHandle("header\nbody"));
      stream.read(7);
      expect(stream.toString()).toBe("body");
      stream.close();
    });

    it("reports failures to the logger and returns an empty string", () => {
      const logger = quietLogger();
      const stream = new Stream(new OutputHandle(() => {}), { logger });
      expect(stream.toString()).toBe("");
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toBe(
        "Stream.toString exception: Cannot read from non-readable stream",
      );
      stream.close();
    });
  });

  describe("getContents()", () => {
    it("reads from the cursor to the end", () => {
      const stream = new Stream(tempHandle("w+", "data"));
      expect(fromBytes(stream.getContents())).toBe("");
      stream.seek(0);
      expect(fromBytes(stream.getContents())).toBe("data");
      expect(fromBytes(stream.getContents())).toBe("");
      stream.close();
    });

    it("wraps handle failures", () => {
      const handle = tempHandle("r+", "data");
      vi.spyOn(handle, "readAll").mockImplementation(() => {
        throw new Error("disk failure");
      });
      const stream = new Stream(handle);
      expect(() => stream.getContents()).toThrow(IOFailureError);
      expect(() => stream.getContents()).toThrow("Unable to read stream contents");
      stream.close();
    });
  });

  describe("eof()", () => {
    it("becomes true only after a read past the end", () => {
      const stream = new Stream(tempHandle("w+", "data"));
      expect(stream.tell()).toBe(4);
      expect(stream.eof()).toBe(false);
      expect(stream.read(1).length).toBe(0);
      expect(stream.eof()).toBe(true);
      stream.close();
    });

    it("is cleared by a seek", () => {
      const stream = new Stream(tempHandle("w+", "data"));
      stream.read(1);
      expect(stream.eof()).toBe(true);
      stream.seek(0);
      expect(stream.eof()).toBe(false);
      stream.close();
    });
  });

  describe("getSize()", () => {
    it("keeps the size consistent with writes", () => {
      const handle = tempHandle("w+");
      expect(handle.write(toBytes("foo"))).toBe(3);
      const stream = new Stream(handle);
      expect(stream.getSize()).toBe(3);
      expect(stream.write("test")).toBe(4);
      expect(stream.getSize()).toBe(7);
      expect(stream.getSize()).toBe(7);
      stream.close();
    });

    it("grows a known size additively even when overwriting", () => {
      const stream = new Stream(tempHandle("w+", "abcd"));
      expect(stream.getSize()).toBe(4);
      stream.seek(0);
      stream.write("xy");
      expect(stream.getSize()).toBe(6);
      stream.close();
    });

    it("keeps the cached value for buffers changed behind the stream", () => {
      const handle = tempHandle("w+", "abc");
      const stream = new Stream(handle);
      expect(stream.getSize()).toBe(3);
      handle.write(toBytes("def"));
      expect(stream.getSize()).toBe(3);
      stream.close();
    });

    it("returns undefined when the handle cannot be stat'ed", () => {
      const logger = quietLogger();
      const stream = new Stream(new OutputHandle(() => {}), { logger });
      expect(stream.getSize()).toBeUndefined();
      expect(logger.debug).toHaveBeenCalledTimes(1);
      stream.close();
    });
  });

  describe("tell() and seek()", () => {
    it("provides the stream position", () => {
      const handle = tempHandle("w+");
      const stream = new Stream(handle);
      expect(stream.tell()).toBe(0);
      stream.write("foo");
      expect(stream.tell()).toBe(3);
      stream.seek(1);
      expect(stream.tell()).toBe(1);
      expect(stream.tell()).toBe(handle.tell());
      stream.close();
    });

    it("seeks relative to the current position and the end", () => {
      const stream = new Stream(tempHandle("w+", "abcdef"));
      stream.seek(-2, SeekWhence.End);
      expect(stream.tell()).toBe(4);
      stream.seek(-3, SeekWhence.Current);
      expect(stream.tell()).toBe(1);
      stream.rewind();
      expect(stream.tell()).toBe(0);
      stream.close();
    });

    it("fails to seek to a negative position", () => {
      const stream = new Stream(tempHandle("w+", "abc"));
      expect(() => stream.seek(-1)).toThrow(IOFailureError);
      expect(() => stream.seek(-1)).toThrow("Unable to seek to stream position -1 with whence 0");
      stream.close();
    });

    it("refuses to seek a non-seekable stream", () => {
      const stream = new Stream(new InputHandle("abc"));
      expect(stream.isSeekable()).toBe(false);
      expect(() => stream.seek(0)).toThrow(IOFailureError);
      expect(() => stream.seek(0)).toThrow("Stream is not seekable");
      stream.close();
    });

    it("wraps tell failures", () => {
      const handle = tempHandle("r+");
      vi.spyOn(handle, "tell").mockImplementation(() => {
        throw new Error("no position");
      });
      const stream = new Stream(handle);
      expect(() => stream.tell()).toThrow("Unable to determine stream position");
      stream.close();
    });
  });

  describe("read()", () => {
    it("returns an empty result for a zero length without touching eof", () => {
      const stream = new Stream(tempHandle("r"));
      expect(stream.read(0).length).toBe(0);
      expect(stream.eof()).toBe(false);
      stream.close();
    });

    it("rejects a negative length", () => {
      const stream = new Stream(tempHandle("r"));
      expect(() => stream.read(-1)).toThrow(InvalidArgumentError);
      expect(() => stream.read(-1)).toThrow("Length parameter cannot be negative");
      stream.close();
    });

    it("reads up to the requested length", () => {
      const stream = new Stream(new MemoryHandle("r", { data: "abcdef" }));
      expect(fromBytes(stream.read(4))).toBe("abcd");
      expect(fromBytes(stream.read(4))).toBe("ef");
      expect(stream.eof()).toBe(true);
      stream.close();
    });

    it("wraps handle read failures", () => {
      const handle = tempHandle("r");
      const failure = new Error("disk failure");
      vi.spyOn(handle, "read").mockImplementation(() => {
        throw failure;
      });
      const stream = new Stream(handle);
      let caught: unknown;
      try {
        stream.read(1);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(IOFailureError);
      expect(caught).toHaveProperty("message", "Unable to read from stream");
      expect(caught).toHaveProperty("cause", failure);
      stream.close();
    });

    it("refuses to read from a write-only stream", () => {
      const stream = new Stream(new OutputHandle(() => {}));
      expect(() => stream.read(1)).toThrow(IOFailureError);
      expect(() => stream.read(1)).toThrow("Cannot read from non-readable stream");
      stream.close();
    });
  });

  describe("write()", () => {
    it("refuses to write to a read-only stream", () => {
      const stream = new Stream(tempHandle("r"));
      expect(() => stream.write("abc")).toThrow(IOFailureError);
      expect(() => stream.write("abc")).toThrow("Cannot write to a non-writable stream");
      stream.close();
    });

    it("wraps handle write failures", () => {
      const handle = tempHandle("w+");
      vi.spyOn(handle, "write").mockImplementation(() => {
        throw new Error("disk full");
      });
      const stream = new Stream(handle);
      expect(() => stream.write("abc")).toThrow("Unable to write to stream");
      stream.close();
    });

    it("accepts bytes", () => {
      const stream = new Stream(tempHandle("w+"));
      expect(stream.write(new Uint8Array([1, 2, 3]))).toBe(3);
      stream.rewind();
      expect(Array.from(stream.getContents())).toEqual([1, 2, 3]);
      stream.close();
    });
  });

  describe("lifecycle", () => {
    it("detaches the handle and clears its properties", () => {
      const logger = quietLogger();
      const handle = tempHandle("r");
      const stream = new Stream(handle, { logger });
      expect(stream.detach()).toBe(handle);
      expect(handle.closed).toBe(false);
      expect(stream.detach()).toBeUndefined();

      expectInert(stream, logger);

      stream.close();
      expect(handle.closed).toBe(false);
      handle.close();
    });

    it("closes the handle and clears its properties", () => {
      const logger = quietLogger();
      const handle = tempHandle("r");
      const stream = new Stream(handle, { logger });
      stream.close();

      expect(handle.closed).toBe(true);
      expectInert(stream, logger);
    });

    it("ignores repeated close calls", () => {
      const handle = tempHandle("r");
      const closeSpy = vi.spyOn(handle, "close");
      const stream = new Stream(handle);
      stream.close();
      stream.close();
      expect(closeSpy).toHaveBeenCalledTimes(1);
    });

    it("reports a failing close to the logger", () => {
      const logger = quietLogger();
      const handle = tempHandle("r");
      vi.spyOn(handle, "close").mockImplementation(() => {
        throw new Error("busy");
      });
      const stream = new Stream(handle, { logger });
      expect(() => stream.close()).not.toThrow();
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error.mock.calls[0][0]).toBe("Unable to close stream handle");
      expect(stream.isReadable()).toBe(false);
    });

    it("closes the handle of a collected stream", async () => {
      const handle = tempHandle("r");
      (() => {
        new Stream(handle);
      })();
      expect(await eventually(() => handle.closed)).toBe(true);
    });

    it("leaves the handle of a collected detached stream open", async () => {
      const handle = tempHandle("r");
      (() => {
        const stream = new Stream(handle);
        stream.detach();
      })();
      expect(await eventually(() => handle.closed, 10)).toBe(false);
      handle.close();
    });

    it("closes the stream when a scoped block ends", () => {
      const handle = tempHandle("w+", "data");
      const text = withStream(handle, (stream) => stream.toString());
      expect(text).toBe("data");
      expect(handle.closed).toBe(true);
    });

    it("closes the stream when a scoped block throws", () => {
      const handle = tempHandle("w+");
      expect(() =>
        withStream(handle, () => {
          throw new Error("boom");
        }),
      ).toThrow("boom");
      expect(handle.closed).toBe(true);
    });
  });

  it("ignores inherited keys in metadata lookups", () => {
    const logger = quietLogger();
    const stream = new Stream(tempHandle("r"), { logger });
    expect(stream.getMetadata("constructor")).toBeUndefined();
    expect(stream.getMetadata("toString")).toBeUndefined();
    expect(stream.getMetadata("hasOwnProperty")).toBeUndefined();
    expect(stream.getMetadata("mode")).toBe("r");

    stream.close();
    expect(stream.getMetadata("constructor")).toBeUndefined();
    expect(stream.getMetadata("toString")).toBeUndefined();
  });

  it("follows a full write, measure, rewind, read cycle", () => {
    const stream = new Stream(openStream("temp://", "w+"));
    expect(stream.write("data")).toBe(4);
    expect(stream.getSize()).toBe(4);
    expect(stream.tell()).toBe(4);
    stream.seek(0);
    expect(fromBytes(stream.getContents())).toBe("data");
    expect(stream.eof()).toBe(false);
    expect(stream.read(1).length).toBe(0);
    expect(stream.eof()).toBe(true);
    stream.close();
  });
});
