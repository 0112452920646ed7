import { fileURLToPath } from "node:url";
import type { ILogObj, Logger, RootRegistry, RootSet } from "rootguard";

/**
 * Turns a root URI from the client into a path. `file://` URIs are decoded;
 * anything else is taken as a plain path (`~` is expanded later by the
 * registry). Other URI schemes are not filesystem locations.
 */
export function rootUriToPath(uri: string): string | undefined {
  if (uri.startsWith("file://")) {
    try {
      return fileURLToPath(uri);
    } catch {
      return undefined;
    }
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(uri)) {
    return undefined;
  }
  return uri;
}

/**
 * Installs the roots announced by the client.
 *
 * Invalid entries are skipped with a warning. When nothing valid remains the
 * previous roots stay active.
 *
 * @returns The active roots afterwards
 */
export async function applyClientRoots(
  uris: readonly string[],
  registry: RootRegistry,
  logger: Logger<ILogObj>,
): Promise<RootSet> {
  const paths: string[] = [];
  for (const uri of uris) {
    const path = rootUriToPath(uri);
    if (path === undefined) {
      logger.warn(`Skipping root with unsupported URI: ${uri}`);
    } else {
      paths.push(path);
    }
  }

  const { valid, accepted, rejected } = await registry.checkRoots(paths);
  for (const { path, error } of rejected) {
    logger.warn(`Skipping invalid root ${path}: ${error.message}`);
  }

  if (valid.length === 0) {
    logger.warn("No valid root directories provided by client, keeping current roots");
    return registry.listRoots();
  }
  return registry.replaceRoots(accepted);
}
