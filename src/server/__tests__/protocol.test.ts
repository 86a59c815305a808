import { describe, it, expect } from "vitest";
import { parseClientMessage } from "../protocol.js";

describe("parseClientMessage", () => {
  it("accepts each client message type", () => {
    expect(parseClientMessage('{"type":"command","text":"lowball 0"}')).toEqual({ type: "command", text: "lowball 0" });
    expect(parseClientMessage('{"type":"prompt","text":"find a lamp"}')).toEqual({ type: "prompt", text: "find a lamp" });
    expect(parseClientMessage('{"type":"cancel"}')).toEqual({ type: "cancel" });
    expect(parseClientMessage('{"type":"list_negotiations"}')).toEqual({ type: "list_negotiations" });
    expect(parseClientMessage('{"type":"save_setting","key":"persona","value":"student"}')).toEqual({
      type: "save_setting",
      key: "persona",
      value: "student",
    });
  });

  it("drops unknown fields", () => {
    expect(parseClientMessage('{"type":"cancel","force":true}')).toEqual({ type: "cancel" });
  });

  it("rejects malformed frames", () => {
    expect(parseClientMessage("not json")).toBeNull();
    expect(parseClientMessage("[1,2]")).toBeNull();
    expect(parseClientMessage('{"type":"command"}')).toBeNull();
    expect(parseClientMessage('{"type":"save_setting","key":"persona","value":3}')).toBeNull();
    expect(parseClientMessage('{"type":"start_negotiation"}')).toBeNull();
  });
});
