/**
 * Generic lazy-import helper for optional npm dependencies.
 *
 * Used by the `ws` transport so the package is only loaded when a default
 * transport is actually opened.
 *
 * @module
 */

/**
 * Dynamically import an npm package and configure a client from it.
 *
 * Wraps "Cannot find module" errors with an install message via the
 * caller-provided error factory.
 *
 * @param packageName - npm package to import (e.g. 'ws')
 * @param load - Performs the import, e.g. `() => import('ws')`
 * @param createError - Factory that creates a domain-specific error from a message
 * @param configure - Extract and instantiate the client from the imported module
 */
export async function ensureLazyModule<M, T>(
  packageName: string,
  load: () => Promise<M>,
  createError: (message: string, cause: unknown) => Error,
  configure: (mod: M) => T,
): Promise<T> {
  let mod: M;
  try {
    mod = await load();
  } catch (err) {
    throw createError(
      `${packageName} package not installed. Install it: npm install ${packageName}`,
      err,
    );
  }
  return configure(mod);
}
