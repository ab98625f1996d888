import type { Component } from "./component.js";

export class UnknownComponentError extends Error {
  constructor(name: string) {
    super(`Unknown component: ${name}`);
    this.name = "UnknownComponentError";
  }
}

/**
 * Node types known to a host, keyed by component name.
 */
export class ComponentRegistry<TContext> {
  private components = new Map<string, Component<TContext>>();

  constructor(components: Component<TContext>[] = []) {
    for (const component of components) {
      this.register(component);
    }
  }

  register(component: Component<TContext>): this {
    if (this.components.has(component.name)) {
      throw new Error(`Component already registered: ${component.name}`);
    }
    this.components.set(component.name, component);
    return this;
  }

  get(name: string): Component<TContext> | undefined {
    return this.components.get(name);
  }

  has(name: string): boolean {
    return this.components.has(name);
  }

  /**
   * Registered components in registration order.
   */
  list(): Component<TContext>[] {
    return [...this.components.values()];
  }

  /**
   * Validate `args` against the component's ports and execute it.
   * @throws UnknownComponentError if no component has that name
   */
  async invoke(
    name: string,
    ctx: TContext,
    args: Record<string, unknown>,
  ): Promise<object> {
    const component = this.components.get(name);
    if (!component) {
      throw new UnknownComponentError(name);
    }
    return component.run(ctx, args);
  }
}
