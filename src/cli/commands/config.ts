import pc from "picocolors";
import { loadConfig } from "../../config/loader";
import { resolveCommandsSettings } from "../../config/settings";

export function validateConfigFile(configPath?: string): void {
  const result = loadConfig(configPath);
  if (result.success && result.config) {
    const settings = resolveCommandsSettings(result.config);
    console.log(pc.green(`Config check passed: ${result.path}`));
    console.log(
      pc.dim(
        `completion ttl ${settings.completion.ttlMs}ms, limit ${settings.completion.limit}, ` +
          `help page size ${settings.help.pageSize}`,
      ),
    );
    return;
  }
  console.error(pc.red(`Config check failed: ${result.path}`));
  for (const error of result.errors ?? []) {
    console.error(`- ${error}`);
  }
  process.exitCode = 1;
}
