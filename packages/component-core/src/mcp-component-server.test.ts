import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { ComponentMcpServer } from "./mcp-component-server.js";
import { ComponentRegistry } from "./registry.js";
import { defineComponent } from "./component.js";

interface CounterContext {
  total: number;
}

const add = defineComponent({
  name: "add",
  description: "Add to the running total",
  inputSchema: {
    type: "object" as const,
    properties: { amount: { type: "number" } },
    required: ["amount"],
  },
  input: z.object({ amount: z.number() }),
  async execute(ctx: CounterContext, { amount }) {
    ctx.total += amount;
    return { total: ctx.total };
  },
});

const fail = defineComponent({
  name: "fail",
  description: "Always fails",
  inputSchema: { type: "object" as const, properties: {} },
  input: z.object({}),
  async execute(_ctx: CounterContext): Promise<{ never: true }> {
    throw new RangeError("out of range");
  },
});

describe("ComponentMcpServer", () => {
  let context: CounterContext;
  let server: ComponentMcpServer<CounterContext>;

  beforeEach(() => {
    context = { total: 0 };
    server = new ComponentMcpServer(
      "counter-server",
      "0.1.0",
      new ComponentRegistry<CounterContext>([add, fail]),
      context,
    );
  });

  describe("getTools", () => {
    it("should expose every registered component as a tool", () => {
      const tools = server.getTools();

      expect(tools.map((t) => t.name)).toEqual(["add", "fail"]);
      expect(tools[0]).toEqual({
        name: "add",
        description: "Add to the running total",
        inputSchema: {
          type: "object",
          properties: { amount: { type: "number" } },
          required: ["amount"],
        },
      });
    });
  });

  describe("callTool", () => {
    it("should thread one context through consecutive calls", async () => {
      await server.callTool("add", { amount: 2 });
      const result = await server.callTool("add", { amount: 3 });

      expect(context.total).toBe(5);
      expect(result).toEqual({
        content: [{ type: "text", text: JSON.stringify({ total: 5 }, null, 2) }],
      });
    });

    it("should return component errors as isError results", async () => {
      const result = await server.callTool("fail", {});

      expect(result).toEqual({
        content: [{ type: "text", text: "RangeError: out of range" }],
        isError: true,
      });
    });

    it("should report invalid input as an isError result", async () => {
      const result = await server.callTool("add", {});

      expect(result).toEqual({
        content: [
          {
            type: "text",
            text: "ComponentInputError: Invalid input for add: amount: Required",
          },
        ],
        isError: true,
      });
      expect(context.total).toBe(0);
    });

    it("should report unknown tools as isError results", async () => {
      const result = await server.callTool("unknown_tool", {});

      expect(result).toEqual({
        content: [
          {
            type: "text",
            text: "UnknownComponentError: Unknown component: unknown_tool",
          },
        ],
        isError: true,
      });
    });
  });
});
