import { Stage } from '../types/index.js';
import { StackctlError } from '../errors/index.js';
import {
  DependencyGraph,
  buildGraph,
  findDependencies,
  findDependents,
  topologicalSort,
} from './dependency-graph.js';

export interface StageEdge {
  /** Stage that must be deployed first */
  from: string;
  to: string;
  reason: string;
}

export interface ResolvedOrder {
  order: string[];
  /** Exactly `order` reversed */
  teardownOrder: string[];
  edges: StageEdge[];
  /** Export name to the stage that produces it */
  producers: Map<string, string>;
  /** Imports satisfied by exports that already exist outside the project */
  externalImports: Map<string, string[]>;
}

export interface ResolveOptions {
  /** Exports that exist outside the project (from ListExports) and may be imported */
  externalExports?: Set<string>;
}

type ResolvableStage = Pick<Stage, 'name' | 'imports' | 'exports' | 'dependsOn'>;

/**
 * Orders stages by their cross-stack references.
 */
export class DependencyResolver {
  private readonly graph: DependencyGraph;
  private readonly resolved: ResolvedOrder;

  constructor(private readonly stages: ResolvableStage[], options: ResolveOptions = {}) {
    const { edges, producers, externalImports } = this.collectEdges(options.externalExports ?? new Set());

    this.graph = buildGraph({
      nodes: stages.map((stage) => ({
        id: stage.name,
        dependsOn: edges.filter((edge) => edge.to === stage.name).map((edge) => edge.from),
      })),
    });

    const { sortedIds, hasCycle, cycleNodes } = topologicalSort({ graph: this.graph });
    if (hasCycle) {
      throw new StackctlError(
        'DEPENDENCY_CYCLE',
        `Dependency cycle detected: ${cycleNodes?.join(' -> ') ?? 'unknown'}`,
        { remediation: 'Remove one of the cross-stack references or depends_on entries that close the cycle' }
      );
    }

    this.resolved = {
      order: sortedIds,
      teardownOrder: [...sortedIds].reverse(),
      edges,
      producers,
      externalImports,
    };
  }

  resolve(): ResolvedOrder {
    return this.resolved;
  }

  /**
   * The given stages in deployment order, optionally with everything they depend on
   * @throws StackctlError for an unknown stage name
   */
  selectStages(names: string[], withDependencies = false): string[] {
    const selected = new Set<string>();
    for (const name of names) {
      if (!this.graph.has(name)) {
        throw new StackctlError('UNKNOWN_STAGE', `Unknown stage: ${name}`);
      }
      selected.add(name);
      if (withDependencies) {
        findDependencies({ graph: this.graph, nodeId: name }).forEach((id) => selected.add(id));
      }
    }
    return this.resolved.order.filter((name) => selected.has(name));
  }

  dependentsOf(name: string): string[] {
    return findDependents({ graph: this.graph, nodeId: name });
  }

  dependenciesOf(name: string): string[] {
    return findDependencies({ graph: this.graph, nodeId: name });
  }

  private collectEdges(externalExports: Set<string>): Pick<ResolvedOrder, 'edges' | 'producers' | 'externalImports'> {
    const producers = new Map<string, string>();
    const names = new Set(this.stages.map((stage) => stage.name));

    for (const stage of this.stages) {
      for (const exportName of stage.exports) {
        const existing = producers.get(exportName);
        if (existing !== undefined && existing !== stage.name) {
          throw new StackctlError(
            'DUPLICATE_EXPORT',
            `Export ${exportName} is produced by both ${existing} and ${stage.name}`,
            { stage: stage.name, remediation: 'Export names are unique per region; rename one of the outputs' }
          );
        }
        producers.set(exportName, stage.name);
      }
    }

    const edges: StageEdge[] = [];
    const externalImports = new Map<string, string[]>();

    for (const stage of this.stages) {
      for (const dependency of stage.dependsOn) {
        if (!names.has(dependency)) {
          throw new StackctlError('UNKNOWN_DEPENDENCY', `Stage ${stage.name} depends on unknown stage ${dependency}`, {
            stage: stage.name,
          });
        }
        edges.push({ from: dependency, to: stage.name, reason: 'depends_on' });
      }

      for (const importName of stage.imports) {
        const producer = producers.get(importName);
        if (producer === stage.name) {
          throw new StackctlError('SELF_IMPORT', `Stage ${stage.name} imports its own export ${importName}`, {
            stage: stage.name,
          });
        }
        if (producer !== undefined) {
          edges.push({ from: producer, to: stage.name, reason: `import ${importName}` });
          continue;
        }
        if (externalExports.has(importName)) {
          externalImports.set(stage.name, [...(externalImports.get(stage.name) ?? []), importName]);
          continue;
        }
        throw new StackctlError(
          'UNRESOLVED_IMPORT',
          `Stage ${stage.name} imports ${importName}, which no stage exports`,
          {
            stage: stage.name,
            remediation: 'Check the <Stage>StackName parameters of this stage against the stack names of earlier stages',
          }
        );
      }
    }

    return { edges, producers, externalImports };
  }
}

export function resolveDeploymentOrder(stages: ResolvableStage[], options: ResolveOptions = {}): ResolvedOrder {
  return new DependencyResolver(stages, options).resolve();
}
