import { loadCities } from "@shared/time/cities";
import { loadPresets } from "@shared/time/presets";
import { TimeSource } from "@shared/time/source";

import { env, logger } from "./logger";
import { createConsoleIO } from "./shell/io";
import { InteractiveShell } from "./shell/shell";

export async function main(): Promise<void> {
  const presets = loadPresets(env.WORLDCLOCK_PRESETS_FILE);
  const cities = loadCities(env.WORLDCLOCK_CITIES_FILE);
  logger.debug(
    { presets: Object.keys(presets), cities: cities.length },
    "configuration loaded",
  );

  const io = createConsoleIO();
  const shell = new InteractiveShell({
    io,
    logger,
    context: { timeSource: new TimeSource(), presets, cities },
  });

  try {
    await shell.run();
  } finally {
    io.close();
  }
}
