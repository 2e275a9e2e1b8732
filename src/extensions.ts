import * as path from 'path';
import { pathToFileURL } from 'url';
import { Logger } from './logger.js';
import { MapperRegistry, MapperResolver } from './mapper-registry.js';

/*
 An extension is an ES module exporting either
   export const resolvers: MapperResolver[]
 or
   export default function (magic, modern) { ... }
 Its resolvers run after the built-in section types.
 */

function isResolver(value: unknown): value is MapperResolver {
  return typeof value === 'function';
}

export function resolversFromModule(specifier: string, mod: Record<string, unknown>): MapperResolver[] {
  const { resolvers, default: fallback } = mod;

  if (Array.isArray(resolvers)) {
    const valid = resolvers.filter(isResolver);
    if (valid.length !== resolvers.length) {
      throw new Error(`Extension ${specifier}: every entry of "resolvers" must be a function`);
    }
    return valid;
  }
  if (isResolver(fallback)) {
    return [fallback];
  }

  throw new Error(`Extension ${specifier} exports neither "resolvers" nor a default resolver`);
}

/**
 * Import extension modules (paths relative to `baseDir`) and append their
 * resolvers to the registry in the order given.
 */
export async function loadExtensions(
  registry: MapperRegistry,
  specifiers: string[],
  baseDir: string = process.cwd(),
): Promise<MapperRegistry> {
  for (const specifier of specifiers) {
    const url = pathToFileURL(path.resolve(baseDir, specifier)).href;
    Logger.log(`Loading extension ${url}`);
    const mod: Record<string, unknown> = await import(url);
    for (const resolver of resolversFromModule(specifier, mod)) {
      registry.register(resolver);
    }
  }
  return registry;
}
