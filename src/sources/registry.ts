import { ConfigurationError } from "../errors";
import type { ProviderDefinition } from "./types";

export type ProviderRegistry = {
  readonly names: () => ReadonlyArray<string>;
  readonly definitions: () => ReadonlyArray<ProviderDefinition>;
  readonly get: (name: string) => ProviderDefinition;
};

export function createProviderRegistry(
  definitions: ReadonlyArray<ProviderDefinition>,
): ProviderRegistry {
  const byName = new Map<string, ProviderDefinition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      throw new Error(`provider registered twice: ${definition.name}`);
    }
    byName.set(definition.name, definition);
  }

  const sorted = Array.from(byName.values()).sort((a, b) =>
    a.name.localeCompare(b.name),
  );

  const names = () => sorted.map((definition) => definition.name);

  return {
    names,
    definitions: () => sorted,
    get(name: string): ProviderDefinition {
      const definition = byName.get(name);
      if (!definition) {
        throw new ConfigurationError(
          `unknown provider "${name}" (supported: ${names().join(", ")})`,
        );
      }
      return definition;
    },
  };
}
