// packages/component-core/src/index.ts
// Host-facing node contract shared by component packages

export {
  defineComponent,
  ComponentInputError,
  type Component,
  type ComponentDefinition,
  type DefinedComponent,
  type PortSchema,
} from "./component.js";

export { ComponentRegistry, UnknownComponentError } from "./registry.js";

export { ComponentMcpServer } from "./mcp-component-server.js";
