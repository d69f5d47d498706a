import { describe, it, expect } from "vitest";
import {
  translateTool,
  translateToolCall,
  translateToolChoice,
} from "../src/translate/tools.js";
import {
  codeExecutionTool,
  collectionsSearchTool,
  documentSearchTool,
  functionTool,
  mcpTool,
  webSearchTool,
  xSearchTool,
} from "../src/types/tool.js";
import type { Tool, ToolChoice } from "../src/types/tool.js";
import { InvalidRequestError } from "../src/types/errors.js";
import { WireToolCallStatus, WireToolCallType, WireToolMode } from "../src/wire/enums.js";
import type { WireTool } from "../src/wire/types.js";

const weather = functionTool(
  "get_weather",
  "Current weather for a city",
  { type: "object", properties: { city: { type: "string" } }, required: ["city"] },
  { strict: true },
);

describe("translateTool", () => {
  it("serializes function parameters to a JSON string", () => {
    expect(translateTool(weather)).toEqual({
      function: {
        name: "get_weather",
        description: "Current weather for a city",
        strict: true,
        parameters:
          '{"type":"object","properties":{"city":{"type":"string"}},"required":["city"]}',
      },
    });
  });

  it("fills exactly one oneof member per variant", () => {
    const cases: Array<[Tool, keyof WireTool]> = [
      [weather, "function"],
      [webSearchTool(), "web_search"],
      [xSearchTool(), "x_search"],
      [codeExecutionTool(), "code_execution"],
      [collectionsSearchTool(["col-1"]), "collections_search"],
      [mcpTool("docs", "https://mcp.example.com"), "mcp"],
      [documentSearchTool(5), "document_search"],
    ];

    for (const [tool, member] of cases) {
      expect(Object.keys(translateTool(tool))).toEqual([member]);
    }
  });

  it("defaults MCP optional collections to empty values", () => {
    expect(translateTool(mcpTool("docs", "https://mcp.example.com"))).toEqual({
      mcp: {
        server_label: "docs",
        server_description: "",
        server_url: "https://mcp.example.com",
        allowed_tool_names: [],
        extra_headers: {},
      },
    });
  });

  it("maps X search dates to timestamps", () => {
    const wire = translateTool(
      xSearchTool({ from_date: new Date("2024-06-01T00:00:00.500Z"), allowed_x_handles: ["a"] }),
    );
    expect(wire.x_search?.from_date).toEqual({ seconds: 1717200000, nanos: 500_000_000 });
    expect(wire.x_search?.allowed_x_handles).toEqual(["a"]);
  });
});

describe("translateToolChoice", () => {
  it("maps modes and named functions", () => {
    expect(translateToolChoice({ mode: "auto" })).toEqual({ mode: WireToolMode.TOOL_MODE_AUTO });
    expect(translateToolChoice({ mode: "none" })).toEqual({ mode: WireToolMode.TOOL_MODE_NONE });
    expect(translateToolChoice({ mode: "required" })).toEqual({
      mode: WireToolMode.TOOL_MODE_REQUIRED,
    });
    expect(translateToolChoice({ mode: "named", tool_name: "get_weather" })).toEqual({
      function_name: "get_weather",
    });
  });

  it("rejects a named choice without a tool name", () => {
    const choice: ToolChoice = JSON.parse('{"mode":"named","tool_name":""}');
    expect(() => translateToolChoice(choice)).toThrow(
      new InvalidRequestError("Named tool choice requires a tool name"),
    );
  });
});

describe("translateToolCall", () => {
  it("round-trips a function tool into a client-side call", () => {
    const wireTool = translateTool(weather);
    const call = translateToolCall({
      id: "call_1",
      type: WireToolCallType.TOOL_CALL_TYPE_CLIENT_SIDE_TOOL,
      status: WireToolCallStatus.TOOL_CALL_STATUS_COMPLETED,
      error_message: "",
      function: { name: wireTool.function?.name ?? "", arguments: '{"city":"Lima"}' },
    });

    expect(call).toEqual({
      id: "call_1",
      kind: "client_side",
      status: "completed",
      function: { name: "get_weather", arguments: '{"city":"Lima"}' },
    });
  });

  it("maps server-side kinds", () => {
    const call = translateToolCall({
      id: "ws_1",
      type: WireToolCallType.TOOL_CALL_TYPE_WEB_SEARCH_TOOL,
      status: WireToolCallStatus.TOOL_CALL_STATUS_FAILED,
      error_message: "quota",
      function: null,
    });
    expect(call.kind).toBe("web_search");
    expect(call.status).toBe("failed");
    expect(call.error_message).toBe("quota");
    expect(call.function).toEqual({ name: "", arguments: "" });
  });

  it("decodes unknown codes to the unknown sentinel", () => {
    const call = translateToolCall({ id: "x", type: 42, status: 99 });
    expect(call.kind).toBe("unknown");
    expect(call.status).toBe("unknown");
  });
});
