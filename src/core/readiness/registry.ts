/**
 * Readiness Evaluator Registry
 *
 * Registry of readiness evaluators indexed by Kubernetes resource kind.
 * Factory modules register their evaluator when they are loaded.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import type { ReadinessEvaluator, ResourceStatus } from '../types/index.js';

interface ReadinessEvaluatorEntry {
  evaluator: ReadinessEvaluator;
  factoryName?: string | undefined;
  resourceKind: string;
}

export class ReadinessEvaluatorRegistry {
  private static instance: ReadinessEvaluatorRegistry | undefined;
  private kindToEvaluator = new Map<string, ReadinessEvaluatorEntry>();

  static getInstance(): ReadinessEvaluatorRegistry {
    if (!ReadinessEvaluatorRegistry.instance) {
      ReadinessEvaluatorRegistry.instance = new ReadinessEvaluatorRegistry();
    }
    return ReadinessEvaluatorRegistry.instance;
  }

  registerForKind(kind: string, evaluator: ReadinessEvaluator, factoryName?: string): void {
    this.kindToEvaluator.set(kind, { evaluator, factoryName, resourceKind: kind });
  }

  getEvaluatorForKind(kind: string): ReadinessEvaluator | null {
    return this.kindToEvaluator.get(kind)?.evaluator ?? null;
  }

  hasEvaluatorForKind(kind: string): boolean {
    return this.kindToEvaluator.has(kind);
  }

  kinds(): string[] {
    return [...this.kindToEvaluator.keys()].sort();
  }
}

/**
 * Register the readiness evaluator a factory defines for its kind
 */
export function registerReadinessEvaluator(
  kind: string,
  evaluator: ReadinessEvaluator,
  factoryName?: string
): ReadinessEvaluator {
  ReadinessEvaluatorRegistry.getInstance().registerForKind(kind, evaluator, factoryName);
  return evaluator;
}

/**
 * Evaluate a live object with the evaluator registered for its kind.
 * Kinds without an evaluator are ready once they exist.
 */
export function evaluateReadiness(liveResource: KubernetesObject): ResourceStatus {
  const kind = liveResource.kind ?? 'Unknown';
  const evaluator = ReadinessEvaluatorRegistry.getInstance().getEvaluatorForKind(kind);
  if (!evaluator) {
    return { ready: true, message: `${kind} exists` };
  }
  try {
    return evaluator(liveResource);
  } catch (error) {
    return {
      ready: false,
      reason: 'EvaluationError',
      message: `Error evaluating ${kind} readiness: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
