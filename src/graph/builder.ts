/**
 * Graph Builder for Workflow Definition
 *
 * Declarative construction of stage graphs. Two equivalent styles are
 * supported and can be mixed:
 *
 * - Explicit: addStage(), addEdge(), addConditionalEdges(), setEntry()
 * - Fluent chaining: start(), then(), branch(), end()
 *
 * compile() validates the definition and returns an immutable CompiledGraph.
 */

import type { AnnotationRoot, StateUpdate } from "./annotation.ts";
import { isDeclaredField } from "./annotation.ts";
import { GraphDefinitionError, SchemaViolationError } from "./errors.ts";
import type {
  CompiledGraph,
  Edge,
  GraphConfig,
  RetryConfig,
  RouteTarget,
  Router,
  StageContext,
  StageDefinition,
  StageId,
} from "./types.ts";
import { TERMINAL, isPseudoState, resolveRouteTarget } from "./types.ts";

// ============================================================================
// GRAPH BUILDER CLASS
// ============================================================================

/**
 * Builder for stage graphs.
 *
 * @template A - The state schema
 *
 * @example
 * ```typescript
 * const workflow = graph(CodingState)
 *   .start(writeTests)
 *   .then(writeCode)
 *   .then(runCode)
 *   .branch((state) => (state.passed ? "done" : "repair"), {
 *     done: TERMINAL,
 *     repair: "write-code",
 *   })
 *   .compile({ checkpoints });
 * ```
 */
export class GraphBuilder<A extends AnnotationRoot> {
  private readonly stages = new Map<StageId, StageDefinition<A>>();

  /** One outgoing definition per source stage */
  private readonly edges = new Map<StageId, Edge<A>>();

  private entryId: StageId | null = null;

  /** Last stage added by the fluent API */
  private cursor: StageId | null = null;

  constructor(private readonly schema: A) {}

  addStage(stage: StageDefinition<A>): this {
    if (isPseudoState(stage.id)) {
      throw new GraphDefinitionError(`"${stage.id}" is reserved and cannot be used as a stage id`);
    }
    if (this.stages.has(stage.id)) {
      throw new GraphDefinitionError(`Stage with id "${stage.id}" already exists`);
    }
    this.stages.set(stage.id, stage);
    return this;
  }

  addEdge(from: StageId, to: StageId): this {
    this.claimSource(from);
    this.edges.set(from, { kind: "static", from, to });
    return this;
  }

  /**
   * Route from `from` by calling `router` on the merged state. The router's
   * label must be one of the keys of `routes`.
   */
  addConditionalEdges<L extends string>(
    from: StageId,
    router: Router<A, L>,
    routes: Record<L, RouteTarget<A>>,
  ): this {
    this.claimSource(from);
    const table = new Map<string, RouteTarget<A>>();
    for (const [label, target] of Object.entries<RouteTarget<A>>(routes)) {
      table.set(label, target);
    }
    if (table.size === 0) {
      throw new GraphDefinitionError(`Conditional edge from "${from}" declares no routes`);
    }
    this.edges.set(from, { kind: "conditional", from, router, routes: table });
    return this;
  }

  setEntry(id: StageId): this {
    this.entryId = id;
    return this;
  }

  // --------------------------------------------------------------------------
  // Fluent chaining
  // --------------------------------------------------------------------------

  /**
   * Add the entry stage and make it the chaining cursor.
   */
  start(stage: StageDefinition<A>): this {
    this.addStage(stage);
    this.setEntry(stage.id);
    this.cursor = stage.id;
    return this;
  }

  /**
   * Add a stage reached by a static edge from the cursor.
   */
  then(stage: StageDefinition<A>): this {
    const from = this.requireCursor("then");
    this.addStage(stage);
    this.addEdge(from, stage.id);
    this.cursor = stage.id;
    return this;
  }

  /**
   * Close the chain with a conditional edge from the cursor.
   */
  branch<L extends string>(router: Router<A, L>, routes: Record<L, RouteTarget<A>>): this {
    const from = this.requireCursor("branch");
    this.addConditionalEdges(from, router, routes);
    this.cursor = null;
    return this;
  }

  /**
   * Close the chain with a static edge from the cursor to TERMINAL.
   */
  end(): this {
    const from = this.requireCursor("end");
    this.addEdge(from, TERMINAL);
    this.cursor = null;
    return this;
  }

  /**
   * Move the cursor to an existing stage.
   */
  from(id: StageId): this {
    if (!this.stages.has(id)) {
      throw new GraphDefinitionError(`Cannot continue from unknown stage "${id}"`);
    }
    this.cursor = id;
    return this;
  }

  // --------------------------------------------------------------------------
  // Compilation
  // --------------------------------------------------------------------------

  /**
   * Validate the definition and produce a CompiledGraph.
   *
   * @throws GraphDefinitionError for a missing entry, a stage without an
   *   outgoing edge, or an edge to an unknown stage
   * @throws SchemaViolationError when a stage declares an unknown `writes` field
   */
  compile(config: GraphConfig = {}): CompiledGraph<A> {
    if (this.entryId === null) {
      throw new GraphDefinitionError("Cannot compile graph without an entry stage");
    }
    if (!this.stages.has(this.entryId)) {
      throw new GraphDefinitionError(`Entry stage "${this.entryId}" is not defined`);
    }

    for (const stage of this.stages.values()) {
      for (const field of stage.writes ?? []) {
        if (!isDeclaredField(this.schema, field)) {
          throw new SchemaViolationError(
            field,
            stage.id,
            `Stage "${stage.id}" declares write to undeclared field "${field}"`,
          );
        }
      }
      if (!this.edges.has(stage.id)) {
        throw new GraphDefinitionError(`Stage "${stage.id}" has no outgoing edge`);
      }
    }

    for (const edge of this.edges.values()) {
      if (!this.stages.has(edge.from)) {
        throw new GraphDefinitionError(`Edge source "${edge.from}" is not a defined stage`);
      }
      const targets =
        edge.kind === "static"
          ? [edge.to]
          : [...edge.routes.values()].map((target) => resolveRouteTarget(target).to);
      for (const to of targets) {
        if (to !== TERMINAL && !this.stages.has(to)) {
          throw new GraphDefinitionError(
            `Edge from "${edge.from}" targets unknown stage "${to}"`,
          );
        }
      }
    }

    return {
      schema: this.schema,
      stages: new Map(this.stages),
      edges: new Map(this.edges),
      entry: this.entryId,
      config,
    };
  }

  private claimSource(from: StageId): void {
    if (this.edges.has(from)) {
      throw new GraphDefinitionError(`Stage "${from}" already has an outgoing edge`);
    }
  }

  private requireCursor(operation: string): StageId {
    if (this.cursor === null) {
      throw new GraphDefinitionError(`${operation}() needs a preceding start(), then() or from()`);
    }
    return this.cursor;
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create a new graph builder for a state schema.
 */
export function graph<A extends AnnotationRoot>(schema: A): GraphBuilder<A> {
  return new GraphBuilder(schema);
}

/**
 * Create a stage definition.
 *
 * @example
 * ```typescript
 * const plan = createStage<typeof ResearchState>(
 *   "planner",
 *   async ({ state }) => ({ queries: await planQueries(state.topic) }),
 *   { writes: ["queries"] },
 * );
 * ```
 */
export function createStage<A extends AnnotationRoot>(
  id: StageId,
  execute: (context: StageContext<A>) => Promise<StateUpdate<A>>,
  options: {
    writes?: ReadonlyArray<keyof A & string>;
    retry?: Partial<RetryConfig>;
    description?: string;
  } = {},
): StageDefinition<A> {
  return { id, execute, ...options };
}
