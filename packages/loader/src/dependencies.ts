import { CircularDependencyError } from "@hearth/errors";

/** What the resolver reads from each integration. */
export interface DependencyNode {
  readonly domain: string;
  readonly dependencies: readonly string[];
  readonly afterDependencies: readonly string[];
}

/** Fetches integrations by domain; rejects with `IntegrationNotFoundError`. */
export interface DependencyLookup {
  getIntegration(domain: string): Promise<DependencyNode>;
}

/**
 * Depth-first walk of `node`'s hard dependencies.
 *
 * `loaded` accumulates every domain reached; `loading` holds the current
 * path. Returns `loaded`, which includes `node.domain` itself.
 *
 * @throws CircularDependencyError when the walk re-enters `loading`, or when
 *   a dependency orders itself after `startDomain`
 * @throws IntegrationNotFoundError when a dependency cannot be fetched
 */
export async function componentDependencies(
  lookup: DependencyLookup,
  startDomain: string,
  node: DependencyNode,
  loaded: Set<string>,
  loading: Set<string>,
): Promise<Set<string>> {
  const domain = node.domain;
  loading.add(domain);

  for (const dependencyDomain of node.dependencies) {
    if (loaded.has(dependencyDomain)) continue;

    if (loading.has(dependencyDomain)) {
      throw new CircularDependencyError(domain, dependencyDomain);
    }

    loaded.add(dependencyDomain);

    const dependency = await lookup.getIntegration(dependencyDomain);

    if (dependency.afterDependencies.includes(startDomain)) {
      throw new CircularDependencyError(startDomain, dependencyDomain);
    }

    if (dependency.dependencies.length > 0) {
      await componentDependencies(lookup, startDomain, dependency, loaded, loading);
    }
  }

  loaded.add(domain);
  loading.delete(domain);
  return loaded;
}
