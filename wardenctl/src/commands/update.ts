import { RegistryUnavailableError } from "../core/errors.js";
import { diag } from "../log/diagnostics.js";
import { updateRegistry } from "../registry/source.js";
import { emit, runCommand, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";

/** Refresh the local cache from `registry.remote_url`. The cache is untouched on failure. */
export function update(opts: CommonOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    try {
      const res = await updateRegistry({
        config: ctx.config.registry,
        schemas: ctx.schemas,
        fetchImpl: ctx.fetchImpl,
        log: ctx.log,
        cwd: ctx.cwd,
      });
      emit(ctx, `Registry updated from ${res.url}: ${res.registry.size} package(s) written to ${res.cachePath}`, {
        url: res.url,
        cache_path: res.cachePath,
        packages: res.registry.size,
      });
      return EXIT.SUCCESS;
    } catch (e) {
      if (!(e instanceof RegistryUnavailableError)) throw e;
      ctx.log(diag("error", e.code, e.message));
      return 1;
    }
  });
}
