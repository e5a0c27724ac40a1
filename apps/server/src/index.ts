import { logger } from "@arena/shared-servers";
import { loadAppConfig } from "./app-config";
import { DefaultArenaLoader } from "./world/arena/arena-loader";
import { ServerArena } from "./world/arena/arena";

const arenaLoader = new DefaultArenaLoader();

const bootServer = async () => {
  const config = loadAppConfig();
  const arenaData = await arenaLoader.load(config.levelId);
  const arena = new ServerArena(arenaData, { debugPaths: config.debugPaths });
  const tickMs = 1000 / config.tickRate;
  let lastEventId = 0;

  logger.info({ levelId: config.levelId, tickRate: config.tickRate }, "Arena host started");

  const timer = setInterval(() => {
    arena.fixedTick(tickMs);

    const batch = arena.getEventsSince(lastEventId);
    if (!batch) {
      logger.warn({ lastEventId }, "Event log overran the host");
      lastEventId = arena.eventLog.getBuffer().latestSeq ?? lastEventId;
    } else {
      for (const event of batch.events) {
        arena.logger.info({ event }, "Arena event");
      }
      lastEventId = batch.toEventId;
    }

    if (arena.isComplete) {
      clearInterval(timer);
      logger.info(
        { outcome: arena.progress.outcome, ticks: arena.tick },
        "Arena host stopped",
      );
    }
  }, tickMs);
};

bootServer().catch((error: unknown) => {
  logger.error({ err: error }, "Failed to boot arena host");
  process.exitCode = 1;
});
