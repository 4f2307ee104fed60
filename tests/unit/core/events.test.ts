import { describe, it, expect, vi } from "vitest";
import { InProcessEventBus } from "../../../src/core/events.js";
import type { PipelineEvent } from "../../../src/core/events.js";
import { createMockLogger } from "../../helpers/mocks.js";

function createEvent(overrides: Partial<PipelineEvent> = {}): PipelineEvent {
  return {
    eventType: "batch.item.completed",
    timestamp: new Date().toISOString(),
    source: "test",
    payload: {},
    ...overrides,
  };
}

describe("InProcessEventBus", () => {
  it("dispatches event to matching subscriber", async () => {
    const bus = new InProcessEventBus(createMockLogger());
    const handler = vi.fn(async () => {});

    bus.subscribe("batch.item.completed", handler);
    await bus.publish(createEvent());

    expect(handler).toHaveBeenCalledOnce();
  });

  it("pattern matches with wildcard (batch.*)", async () => {
    const bus = new InProcessEventBus(createMockLogger());
    const handler = vi.fn(async () => {});

    bus.subscribe("batch.*", handler);
    await bus.publish(createEvent({ eventType: "batch.item.completed" }));
    await bus.publish(createEvent({ eventType: "batch.completed" }));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("does not dispatch to non-matching subscribers", async () => {
    const bus = new InProcessEventBus(createMockLogger());
    const handler = vi.fn(async () => {});

    bus.subscribe("batch.item.*", handler);
    await bus.publish(createEvent({ eventType: "batch.completed" }));

    expect(handler).not.toHaveBeenCalled();
  });

  it("events with no matching subscriber are silently dropped", async () => {
    const bus = new InProcessEventBus(createMockLogger());
    await expect(bus.publish(createEvent())).resolves.toBeUndefined();
  });

  it("handler errors are caught and logged, not propagated", async () => {
    const logger = createMockLogger();
    const bus = new InProcessEventBus(logger);
    const second = vi.fn(async () => {});

    bus.subscribe("batch.*", async () => {
      throw new Error("Handler boom");
    });
    bus.subscribe("batch.*", second);

    await expect(bus.publish(createEvent())).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalled();
    expect(second).toHaveBeenCalledOnce();
  });
});
