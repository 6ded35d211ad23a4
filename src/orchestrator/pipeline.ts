import type { StateRecord } from './data-flow';
import type { Stage } from './stage';
import { Pipeline, type CompiledStage, type PipelineOptions } from './workflow';

export class PipelineDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineDefinitionError';
  }
}

interface Edge {
  from: string;
  to: string;
}

/**
 * PipelineDefinition collects named stages, the edges between them and the
 * entry / finish markers. `compile()` checks that they form one linear chain
 * and returns a reusable {@link Pipeline}.
 *
 * Stages are registered externally (real agents in production, fakes in
 * tests) so the definition has no dependency on any particular backend.
 */
export class PipelineDefinition<S extends StateRecord> {
  private stages = new Map<string, Stage<S>>();
  private edges: Edge[] = [];
  private entryPoint?: string;
  private finishPoint?: string;

  /** Register a stage under a unique name */
  addStage(name: string, stage: Stage<S>): this {
    if (!name.trim()) {
      throw new PipelineDefinitionError('Stage name must not be empty');
    }
    if (this.hasStage(name)) {
      throw new PipelineDefinitionError(`Stage already registered: ${name}`);
    }
    this.stages.set(name, stage);
    return this;
  }

  addEdge(from: string, to: string): this {
    this.edges.push({ from, to });
    return this;
  }

  /** Add an edge between each consecutive pair of names */
  chain(...names: string[]): this {
    let previous: string | undefined;
    for (const name of names) {
      if (previous !== undefined) this.addEdge(previous, name);
      previous = name;
    }
    return this;
  }

  setEntryPoint(name: string): this {
    this.entryPoint = name;
    return this;
  }

  setFinishPoint(name: string): this {
    this.finishPoint = name;
    return this;
  }

  hasStage(name: string): boolean {
    return this.stages.has(name);
  }

  getRegisteredStages(): string[] {
    return [...this.stages.keys()];
  }

  /**
   * Validate the topology and produce a runnable pipeline.
   * @throws PipelineDefinitionError if the stages do not form a single entry-to-finish chain
   */
  compile(options: PipelineOptions = {}): Pipeline<S> {
    const steps: CompiledStage<S>[] = this.resolveChain().map((name) => ({ name, stage: this.requireStage(name) }));
    return new Pipeline(steps, options);
  }

  // ── Validation ──────────────────────────────────────────────────────

  private resolveChain(): string[] {
    const entry = this.entryPoint;
    const finish = this.finishPoint;
    if (entry === undefined) throw new PipelineDefinitionError('Entry point is not set');
    if (finish === undefined) throw new PipelineDefinitionError('Finish point is not set');
    if (!this.hasStage(entry)) throw new PipelineDefinitionError(`Entry point references unknown stage: ${entry}`);
    if (!this.hasStage(finish)) throw new PipelineDefinitionError(`Finish point references unknown stage: ${finish}`);

    const next = new Map<string, string>();
    const previous = new Map<string, string>();

    for (const { from, to } of this.edges) {
      for (const name of [from, to]) {
        if (!this.hasStage(name)) {
          throw new PipelineDefinitionError(`Edge ${from} -> ${to} references unknown stage: ${name}`);
        }
      }
      if (from === to) throw new PipelineDefinitionError(`Stage ${from} has an edge to itself`);
      if (next.has(from)) throw new PipelineDefinitionError(`Stage ${from} has more than one outgoing edge`);
      if (previous.has(to)) throw new PipelineDefinitionError(`Stage ${to} has more than one incoming edge`);
      next.set(from, to);
      previous.set(to, from);
    }

    if (previous.has(entry)) throw new PipelineDefinitionError(`Entry stage ${entry} must not have incoming edges`);
    if (next.has(finish)) throw new PipelineDefinitionError(`Finish stage ${finish} must not have outgoing edges`);

    const order = [entry];
    const visited = new Set(order);
    let current = entry;

    while (current !== finish) {
      const following = next.get(current);
      if (following === undefined) {
        throw new PipelineDefinitionError(`No path from ${entry} to ${finish}: ${current} has no outgoing edge`);
      }
      visited.add(following);
      order.push(following);
      current = following;
    }

    const unreachable = this.getRegisteredStages().filter((name) => !visited.has(name));
    if (unreachable.length > 0) {
      throw new PipelineDefinitionError(`Stages not on the chain from ${entry} to ${finish}: ${unreachable.join(', ')}`);
    }

    return order;
  }

  private requireStage(name: string): Stage<S> {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new PipelineDefinitionError(`No stage registered for name: ${name}`);
    }
    return stage;
  }
}
