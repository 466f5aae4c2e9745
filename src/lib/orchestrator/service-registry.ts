import {
  CyclicDependencyError,
  DuplicateServiceError,
  InvalidSpecError,
  ServiceNotFoundError,
} from './errors';
import {
  buildDependentsMap,
  findDependencyCycle,
  topologicalOrder,
} from './dependency-graph';
import { assertValidSpec } from './service-spec';
import type { ServiceSpec } from './types';

/**
 * Validated, insertion-ordered set of service specs.
 *
 * `register()` requires every dependency to be registered first, so the
 * registry can never hold a cycle. `fromSpecs()` accepts a whole topology
 * with forward references and rejects cycles with `CyclicDependencyError`.
 */
export class ServiceRegistry {
  private specs = new Map<string, ServiceSpec>();

  /**
   * Builds a registry from a complete topology where specs may reference
   * services declared after them.
   *
   * @throws DuplicateServiceError, InvalidSpecError, CyclicDependencyError
   */
  public static fromSpecs(specs: readonly ServiceSpec[]): ServiceRegistry {
    const names = new Set<string>();

    for (const spec of specs) {
      if (names.has(spec.name)) {
        throw new DuplicateServiceError({ serviceName: spec.name });
      }

      names.add(spec.name);
      assertValidSpec(spec);
    }

    for (const spec of specs) {
      for (const dependency of spec.dependsOn) {
        if (!names.has(dependency)) {
          throw new InvalidSpecError({
            serviceName: spec.name,
            reason: `depends on "${dependency}", which is not declared`,
          });
        }
      }
    }

    const registry = new ServiceRegistry();

    for (const spec of specs) {
      registry.specs.set(spec.name, spec);
    }

    registry.validateAcyclic();

    return registry;
  }

  public get size(): number {
    return this.specs.size;
  }

  /**
   * @throws DuplicateServiceError, InvalidSpecError
   */
  public register(spec: ServiceSpec): void {
    if (this.specs.has(spec.name)) {
      throw new DuplicateServiceError({ serviceName: spec.name });
    }

    assertValidSpec(spec);

    for (const dependency of spec.dependsOn) {
      if (!this.specs.has(dependency)) {
        throw new InvalidSpecError({
          serviceName: spec.name,
          reason: `depends on "${dependency}", which is not registered`,
        });
      }
    }

    this.specs.set(spec.name, spec);
  }

  public has(name: string): boolean {
    return this.specs.has(name);
  }

  public get(name: string): ServiceSpec | undefined {
    return this.specs.get(name);
  }

  /**
   * @throws ServiceNotFoundError
   */
  public require(name: string): ServiceSpec {
    const spec = this.specs.get(name);

    if (!spec) {
      throw new ServiceNotFoundError({ serviceName: name });
    }

    return spec;
  }

  /**
   * Specs in insertion order
   */
  public all(): ServiceSpec[] {
    return [...this.specs.values()];
  }

  public names(): string[] {
    return [...this.specs.keys()];
  }

  /**
   * @throws CyclicDependencyError naming the services of one cycle
   */
  public validateAcyclic(): void {
    const cycle = findDependencyCycle(buildDependentsMap(this.all()));

    if (cycle.length > 0) {
      throw new CyclicDependencyError({ cycle });
    }
  }

  /**
   * Names in dependency order, ties broken by insertion order
   */
  public startupOrder(): string[] {
    return topologicalOrder(this.all());
  }
}
