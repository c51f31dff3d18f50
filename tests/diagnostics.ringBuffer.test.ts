import { describe, it } from "mocha";
import { expect } from "chai";

import { DiagnosticsHub, type EventRecord } from "../src/monitor/diagnostics.js";
import { RingBuffer } from "../src/monitor/ringBuffer.js";

function event(callId: string, status: EventRecord["status"]): EventRecord {
  return {
    call_id: callId,
    tool_name: "echo",
    timestamp: "2024-01-01T00:00:00.000Z",
    status,
    write_action: false,
  };
}

describe("ring buffer", () => {
  it("evicts the oldest records and counts them", () => {
    const buffer = new RingBuffer<number>(3);
    for (let value = 1; value <= 5; value += 1) {
      buffer.append(value);
    }
    expect(buffer.snapshot()).to.deep.equal([5, 4, 3]);
    expect(buffer.snapshot(undefined, false)).to.deep.equal([3, 4, 5]);
    expect(buffer.stats()).to.deep.equal({ size: 3, capacity: 3, dropped: 2 });
  });

  it("honours snapshot limits without mutating the buffer", () => {
    const buffer = new RingBuffer<string>(10);
    buffer.append("a");
    buffer.append("b");
    buffer.append("c");
    expect(buffer.snapshot(2)).to.deep.equal(["c", "b"]);
    expect(buffer.snapshot(0)).to.deep.equal([]);
    expect(buffer.snapshot(50)).to.deep.equal(["c", "b", "a"]);
    expect(buffer.size).to.equal(3);
  });

  it("never evicts when the capacity is zero", () => {
    const buffer = new RingBuffer<number>(0);
    for (let value = 0; value < 100; value += 1) {
      buffer.append(value);
    }
    expect(buffer.stats()).to.deep.equal({ size: 100, capacity: 0, dropped: 0 });
  });

  it("keeps the drop counter across clears", () => {
    const buffer = new RingBuffer<number>(1);
    buffer.append(1);
    buffer.append(2);
    buffer.clear();
    buffer.append(3);
    expect(buffer.snapshot()).to.deep.equal([3]);
    expect(buffer.dropped).to.equal(1);
  });
});

describe("diagnostics hub", () => {
  it("keeps independent capacities per buffer", () => {
    const hub = new DiagnosticsHub({ events: 2, logs: 5, errors: 1 });
    hub.recordEvent(event("c1", "start"));
    hub.recordEvent(event("c1", "ok"));
    hub.recordEvent(event("c2", "start"));

    expect(hub.stats()).to.deep.equal({
      events: { size: 2, capacity: 2, dropped: 1 },
      logs: { size: 0, capacity: 5, dropped: 0 },
      errors: { size: 0, capacity: 1, dropped: 0 },
    });
  });

  it("filters successful events on request", () => {
    const hub = new DiagnosticsHub({ events: 10, logs: 10, errors: 10 });
    hub.recordEvent(event("c1", "start"));
    hub.recordEvent(event("c1", "error"));
    hub.recordEvent(event("c2", "start"));
    hub.recordEvent(event("c2", "ok"));
    hub.recordEvent(event("c3", "cancelled"));

    expect(hub.recentEvents(10, { includeSuccess: false }).map((record) => `${record.call_id}:${record.status}`)).to.deep.equal([
      "c3:cancelled",
      "c1:error",
    ]);
    expect(hub.recentEvents(2).map((record) => record.status)).to.deep.equal(["cancelled", "ok"]);
  });

  it("redacts records before storing them", () => {
    const hub = new DiagnosticsHub({ events: 10, logs: 10, errors: 10 });
    hub.recordEvent({ ...event("c1", "error"), message: "sent as ops@example.com" });
    hub.recordError({
      call_id: "c1",
      tool_name: "echo",
      timestamp: "2024-01-01T00:00:00.000Z",
      status: "error",
      category: "upstream",
      origin: "internal",
      code: "E-TOOL-UPSTREAM",
      message: "Authorization: Bearer test-secret-value",
      details: { token: "test-secret", host: "10.0.0.1" },
    });

    expect(hub.recentEvents(1)[0]?.message).to.equal("sent as [REDACTED_EMAIL]");
    const [stored] = hub.recentErrors(1);
    expect(stored?.message).to.equal("Authorization: Bearer [REDACTED]");
    expect(stored?.details).to.deep.equal({ token: "[REDACTED]", host: "[REDACTED_IP]" });
  });

  it("converts logger entries into log records", () => {
    const hub = new DiagnosticsHub({ events: 10, logs: 10, errors: 10 });
    hub.recordLogEntry({
      timestamp: "2024-01-01T00:00:00.000Z",
      level: "warn",
      message: "tool_call_failed",
      call_id: "c9",
      tool: "echo",
      payload: { code: "E-TOOL-VALIDATION" },
    });
    expect(hub.recentLogs(5)).to.deep.equal([
      {
        call_id: "c9",
        tool_name: "echo",
        timestamp: "2024-01-01T00:00:00.000Z",
        status: "warn",
        message: "tool_call_failed",
        payload: { code: "E-TOOL-VALIDATION" },
      },
    ]);
  });
});
