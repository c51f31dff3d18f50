import { describe, it } from "mocha";
import { expect } from "chai";

import { CallCancelledError } from "../src/errors/cancellation.js";
import { ToolTimeoutError, UpstreamError } from "../src/errors/taxonomy.js";
import { MetricsRegistry } from "../src/infra/metrics.js";
import { OutboundLimiter } from "../src/infra/outbound.js";
import { captureRejection, deferred, flushMicrotasks } from "./helpers/async.js";

describe("outbound limiter", () => {
  it("never runs more requests than its concurrency", async () => {
    const metrics = new MetricsRegistry();
    const limiter = new OutboundLimiter({ concurrency: 2, metrics });
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()];
    let running = 0;
    let peak = 0;

    const runs = gates.map((gate) =>
      limiter.run("github", async () => {
        running += 1;
        peak = Math.max(peak, running);
        const value = await gate.promise;
        running -= 1;
        return value;
      }),
    );
    await flushMicrotasks();
    expect(limiter.activeCount).to.equal(2);
    expect(limiter.pendingCount).to.equal(1);

    gates.forEach((gate, index) => gate.resolve(`r${index}`));
    expect(await Promise.all(runs)).to.deep.equal(["r0", "r1", "r2"]);
    expect(peak).to.equal(2);
    expect(metrics.snapshot().upstreams.github?.requests_total).to.equal(3);
  });

  it("counts rate limiting reported by responses and failures", async () => {
    const metrics = new MetricsRegistry();
    const limiter = new OutboundLimiter({ concurrency: 4, metrics });

    await limiter.run("github", async () => ({ status: 200, remaining: 0 }), {
      inspect: (response) => ({ status: response.status, rateLimitRemaining: response.remaining }),
    });
    await captureRejection(
      limiter.run("github", async () => {
        throw new UpstreamError("too many requests", { status: 429, bucket: "github" });
      }),
    );
    await captureRejection(
      limiter.run("github", async () => {
        throw new ToolTimeoutError("get_file_contents", 100);
      }),
    );

    expect(metrics.snapshot().upstreams.github).to.deep.equal({
      requests_total: 3,
      errors_total: 2,
      rate_limited_total: 2,
      timeouts_total: 1,
    });
  });

  it("drops queued requests whose caller gave up", async () => {
    const metrics = new MetricsRegistry();
    const limiter = new OutboundLimiter({ concurrency: 1, metrics });
    const gate = deferred<string>();
    const controller = new AbortController();
    let started = false;

    const first = limiter.run("github", () => gate.promise);
    const second = limiter.run(
      "github",
      async () => {
        started = true;
        return "late";
      },
      { signal: controller.signal },
    );
    controller.abort("caller gave up");

    expect(await captureRejection(second)).to.be.instanceOf(CallCancelledError);
    gate.resolve("first");
    expect(await first).to.equal("first");
    await flushMicrotasks();
    expect(started).to.equal(false);
    expect(metrics.snapshot().upstreams.github?.requests_total).to.equal(1);
  });
});
