import { main } from "../src/index";
import { logger } from "../src/logger";

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "worldclock failed to start");
  process.exit(1);
});
