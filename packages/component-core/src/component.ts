import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { ZodError, z } from "zod";

/**
 * JSON Schema describing a component's input ports, as the host lists them.
 */
export type PortSchema = Tool["inputSchema"];

/**
 * Definition of a single workflow component.
 *
 * `input` validates the raw arguments the host hands over; `inputSchema` is
 * the same contract in JSON Schema form for hosts that render ports.
 * `execute` performs the component's work and returns its output ports.
 */
export interface ComponentDefinition<
  TContext,
  TInput extends z.ZodTypeAny,
  TOutput extends object,
> {
  name: string;
  description: string;
  inputSchema: PortSchema;
  input: TInput;
  execute(ctx: TContext, input: z.output<TInput>): Promise<TOutput>;
}

/**
 * Type-erased component as stored in a registry.
 */
export interface Component<TContext> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: PortSchema;
  run(ctx: TContext, args: Record<string, unknown>): Promise<object>;
}

export interface DefinedComponent<
  TContext,
  TInput extends z.ZodTypeAny,
  TOutput extends object,
> extends Component<TContext> {
  execute(ctx: TContext, input: z.output<TInput>): Promise<TOutput>;
}

export class ComponentInputError extends Error {
  constructor(
    public readonly component: string,
    public readonly issues: string[],
  ) {
    super(`Invalid input for ${component}: ${issues.join("; ")}`);
    this.name = "ComponentInputError";
  }
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const port = issue.path.length > 0 ? issue.path.join(".") : "(input)";
    return `${port}: ${issue.message}`;
  });
}

export function defineComponent<
  TContext,
  TInput extends z.ZodTypeAny,
  TOutput extends object,
>(
  definition: ComponentDefinition<TContext, TInput, TOutput>,
): DefinedComponent<TContext, TInput, TOutput> {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    execute: (ctx, input) => definition.execute(ctx, input),
    async run(ctx, args) {
      const parsed = definition.input.safeParse(args);
      if (!parsed.success) {
        throw new ComponentInputError(
          definition.name,
          describeIssues(parsed.error),
        );
      }
      return definition.execute(ctx, parsed.data);
    },
  };
}
