/**
 * orcasync config - Show the resolved configuration
 */

import { openContext, reportError, type RepoOptions } from "../shared.js";

export type ConfigOptions = RepoOptions & {
  json?: boolean;
};

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    const { config } = await openContext(options, { quiet: true });

    if (options.json) {
      console.log(JSON.stringify(config, null, 2));
      return;
    }

    console.log(`Repository:    ${config.repoRoot}`);
    console.log(`Sync folders:  ${config.syncFolders.join(", ")}`);
    console.log(`Exclude:       ${config.exclude.length > 0 ? config.exclude.join(", ") : "(none)"}`);
    console.log(`Trust mtime:   ${config.trustMtime ? "yes" : "no"}`);
    console.log(`History:       ${config.historyPath}`);
  } catch (error) {
    reportError(error);
  }
}
