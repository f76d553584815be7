import { CONFIG_FILE, loadConfigWithSources } from "../config.js";
import { outputSuccess } from "../output.js";

export async function handleConfig(): Promise<never> {
  const configWithSources = loadConfigWithSources();

  return outputSuccess({
    dbPath: configWithSources.dbPath,
    solveWindowSeconds: configWithSources.solveWindowSeconds,
    tempDir: configWithSources.tempDir,
    configFile: CONFIG_FILE,
  });
}
