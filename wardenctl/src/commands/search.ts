import { diag } from "../log/diagnostics.js";
import { openRegistry, runCommand, type CommandResult, type CommonOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";
import { emitRecords } from "./list.js";

/** Case-insensitive keyword search; no match is not an error. */
export function search(keyword: string, opts: CommonOptions): Promise<CommandResult> {
  return runCommand(opts, async (ctx) => {
    const { registry } = await openRegistry(ctx);
    const matches = registry.search(keyword);
    if (matches.length === 0) {
      ctx.log(diag("info", "SEARCH_NO_MATCH", `No packages match '${keyword}'`));
    }
    emitRecords(ctx, matches);
    return EXIT.SUCCESS;
  });
}
