import { describe, it, expect } from "vitest";
import {
  decodeMessage,
  encodeMessage,
  fireAtOf,
  parseScheduleInput,
} from "./message-schema.js";
import { CorruptRecordError, InvalidArgumentError } from "./errors.js";

const valid = {
  id: "acc1_2h",
  scheduleTo: "2030-01-01T12:00:00Z",
  payload: { a: 1 },
  webhookUrl: "http://example.test/hook",
};

describe("parseScheduleInput", () => {
  it("normalizes offsets to UTC", () => {
    const m = parseScheduleInput({ ...valid, scheduleTo: "2030-01-01T09:30:00-03:00" });
    expect(m.scheduleTo).toBe("2030-01-01T12:30:00.000Z");
    expect(fireAtOf(m).getTime()).toBe(Date.parse("2030-01-01T12:30:00Z"));
  });

  it("passes the payload through unchanged", () => {
    const payload = { nested: { list: [1, "two", null] }, flag: true };
    expect(parseScheduleInput({ ...valid, payload }).payload).toEqual(payload);
  });

  it("reads timestamps without an offset as UTC", () => {
    const m = parseScheduleInput({ ...valid, scheduleTo: "2030-01-01T10:00:00" });
    expect(m.scheduleTo).toBe("2030-01-01T10:00:00.000Z");
  });

  it("rejects a date without a time", () => {
    expect(() => parseScheduleInput({ ...valid, scheduleTo: "2030-01-01" })).toThrow(
      InvalidArgumentError,
    );
  });

  it("lists every invalid field", () => {
    try {
      parseScheduleInput({ id: "", scheduleTo: "soon", payload: [], webhookUrl: "nope" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError);
      const paths = (err instanceof InvalidArgumentError ? err.issues : []).map(
        (i) => i.path,
      );
      expect(paths).toEqual(["id", "scheduleTo", "payload", "webhookUrl"]);
    }
  });

  it("rejects a missing body", () => {
    expect(() => parseScheduleInput(undefined)).toThrow(InvalidArgumentError);
  });
});

describe("decodeMessage", () => {
  it("reads what encodeMessage wrote", () => {
    const m = parseScheduleInput(valid);
    expect(decodeMessage("acc1_2h", encodeMessage(m))).toEqual(m);
  });

  it("normalizes stored timestamps the same way as input", () => {
    const naive = "2030-01-01T10:00:00";
    const raw = JSON.stringify({ ...valid, scheduleTo: naive });
    const decoded = decodeMessage("acc1_2h", raw).scheduleTo;
    expect(decoded).toBe("2030-01-01T10:00:00.000Z");
    expect(decoded).toBe(parseScheduleInput({ ...valid, scheduleTo: naive }).scheduleTo);
  });

  it("normalizes stored offsets to UTC", () => {
    const raw = JSON.stringify({ ...valid, scheduleTo: "2030-01-01T09:30:00-03:00" });
    expect(decodeMessage("acc1_2h", raw).scheduleTo).toBe("2030-01-01T12:30:00.000Z");
  });

  it("rejects values that are not JSON", () => {
    expect(() => decodeMessage("x", "{oops")).toThrow(
      "Stored message 'x' is unreadable: not JSON",
    );
  });

  it("rejects records whose id does not match the key", () => {
    expect(() => decodeMessage("other", JSON.stringify(valid))).toThrow(
      CorruptRecordError,
    );
  });

  it("rejects records with an unparseable timestamp", () => {
    const raw = JSON.stringify({ ...valid, scheduleTo: "tomorrow" });
    expect(() => decodeMessage("acc1_2h", raw)).toThrow(
      "Stored message 'acc1_2h' is unreadable: scheduleTo unparseable timestamp",
    );
  });
});
