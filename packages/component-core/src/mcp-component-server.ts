import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  type Tool,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { ComponentRegistry } from "./registry.js";

/**
 * Exposes every component of a registry as an MCP tool.
 *
 * One server instance is one run: the same `context` object is handed to
 * every tool call, so a component that stores something on it (for example
 * an authenticated session) makes it available to the calls that follow.
 *
 * Errors thrown by a component are returned as `isError` tool results so the
 * host can surface them; they are not retried.
 */
export class ComponentMcpServer<TContext> {
  protected server: Server;

  constructor(
    name: string,
    version: string,
    protected readonly registry: ComponentRegistry<TContext>,
    protected readonly context: TContext,
  ) {
    this.server = new Server(
      { name, version },
      { capabilities: { tools: {} } },
    );
    this.setupHandlers();
  }

  public getTools(): Tool[] {
    return this.registry.list().map((component) => ({
      name: component.name,
      description: component.description,
      inputSchema: component.inputSchema,
    }));
  }

  /**
   * Run a component and format its outputs (or its error) as a tool result.
   */
  public async callTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    try {
      const result = await this.registry.invoke(name, this.context, args);
      return this.formatResult(result);
    } catch (error) {
      return this.formatError(error);
    }
  }

  protected formatResult(result: object): CallToolResult {
    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  }

  protected formatError(error: unknown): CallToolResult {
    const text =
      error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return {
      content: [{ type: "text" as const, text }],
      isError: true,
    };
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
  }
}
