import { describe, it, expect } from "vitest";
import { ChunkAccumulator } from "../src/types/stream.js";
import { EMPTY_USAGE } from "../src/types/response.js";
import type { ChatChunk, TokenUsage } from "../src/types/response.js";
import type { ToolCall } from "../src/types/tool.js";

function chunk(overrides?: Partial<ChatChunk>): ChatChunk {
  return {
    id: "resp_1",
    model: "grok-4",
    delta: "",
    tool_calls: [],
    citations: [],
    ...overrides,
  };
}

function usage(total_tokens: number): TokenUsage {
  return { ...EMPTY_USAGE, total_tokens };
}

function toolCall(id: string, args: string, name = "lookup"): ToolCall {
  return {
    id,
    kind: "client_side",
    status: "completed",
    function: { name, arguments: args },
  };
}

describe("ChunkAccumulator", () => {
  it("concatenates deltas in arrival order", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ delta: "Hel" }));
    acc.process(chunk({ delta: "lo" }));
    acc.process(chunk({ delta: "!", finish_reason: { reason: "stop" } }));

    const response = acc.response();
    expect(response.content).toBe("Hello!");
    expect(response.finish_reason).toEqual({ reason: "stop" });
    expect(response.id).toBe("resp_1");
    expect(response.model).toBe("grok-4");
  });

  it("reports unknown before the terminal chunk", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ delta: "partial" }));
    expect(acc.finished).toBe(false);
    expect(acc.response().finish_reason).toEqual({ reason: "unknown" });
  });

  it("keeps the latest cumulative usage", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ cumulative_usage: usage(5) }));
    acc.process(chunk({ cumulative_usage: usage(12) }));
    expect(acc.response().usage.total_tokens).toBe(12);
  });

  it("keeps usage when a later chunk reports none", () => {
    const acc = new ChunkAccumulator();
    acc.process(
      chunk({
        cumulative_usage: { ...EMPTY_USAGE, prompt_tokens: 3, completion_tokens: 2, total_tokens: 5 },
        finish_reason: { reason: "stop" },
      }),
    );
    acc.process(chunk());

    expect(acc.response().usage).toEqual({
      ...EMPTY_USAGE,
      prompt_tokens: 3,
      completion_tokens: 2,
      total_tokens: 5,
    });
  });

  it("reports empty usage when no chunk carried any", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ delta: "x" }));
    expect(acc.response().usage).toEqual(EMPTY_USAGE);
  });

  it("joins reasoning deltas only when some arrived", () => {
    const withReasoning = new ChunkAccumulator();
    withReasoning.process(chunk({ reasoning_delta: "first, " }));
    withReasoning.process(chunk({ reasoning_delta: "then" }));
    expect(withReasoning.response().reasoning_content).toBe("first, then");

    const without = new ChunkAccumulator();
    without.process(chunk({ delta: "x" }));
    expect("reasoning_content" in without.response()).toBe(false);
  });

  it("lets a later copy of a tool call replace an earlier one", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ tool_calls: [toolCall("a", "{")] }));
    acc.process(
      chunk({
        tool_calls: [toolCall("a", '{"q":1}'), toolCall("b", "{}")],
        finish_reason: { reason: "tool_calls" },
      }),
    );

    expect(acc.response().tool_calls.map((c) => [c.id, c.function.arguments])).toEqual([
      ["a", '{"q":1}'],
      ["b", "{}"],
    ]);
    expect(acc.finished).toBe(true);
  });

  it("keeps calls without an id in arrival order", () => {
    const acc = new ChunkAccumulator();
    acc.process(
      chunk({
        tool_calls: [toolCall("", "{}", "a"), toolCall("", "{}", "b")],
        finish_reason: { reason: "tool_calls" },
      }),
    );

    expect(acc.response().tool_calls.map((c) => c.function.name)).toEqual(["a", "b"]);
  });

  it("collects citations without duplicates", () => {
    const acc = new ChunkAccumulator();
    acc.process(chunk({ citations: ["https://a.example"] }));
    acc.process(chunk({ citations: ["https://a.example", "https://b.example"] }));
    expect(acc.response().citations).toEqual(["https://a.example", "https://b.example"]);
  });
});
