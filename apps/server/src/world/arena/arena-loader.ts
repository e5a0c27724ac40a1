import { type ArenaLevelDefinition, createArenaLevel, parseLevelDefinition } from "@arena/shared";
import { findUnsupportedCorners } from "@arena/shared-sim";
import { logger } from "@arena/shared-servers";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ArenaData } from "./arena";

export abstract class ArenaDataLoader {
  abstract load(levelId: string, arenaId?: string): Promise<ArenaData>;
}

export class DefaultArenaLoader extends ArenaDataLoader {
  private static readonly LEVELS_ASSET_PATH = fileURLToPath(
    new URL("../../../../../packages/assets/levels/", import.meta.url),
  );

  constructor(private readonly levelsPath: string = DefaultArenaLoader.LEVELS_ASSET_PATH) {
    super();
  }

  async load(levelId: string, arenaId: string = levelId): Promise<ArenaData> {
    try {
      const definition = await this.loadLevelDefinitionFromAssets(levelId);
      const level = createArenaLevel(definition);
      const unsupported = findUnsupportedCorners(level);
      if (unsupported.length > 0) {
        logger.warn({ levelId, unsupported }, "Level contains unsupported corner patterns");
      }
      return new ArenaData(arenaId, level);
    } catch (error) {
      logger.error({ err: error, levelId }, "Failed to load level");
      throw error;
    }
  }

  protected async loadLevelDefinitionFromAssets(levelId: string): Promise<ArenaLevelDefinition> {
    const levelPath = path.resolve(this.levelsPath, `${levelId}.json`);
    const json = await readFile(levelPath, "utf8");
    return parseLevelDefinition(JSON.parse(json), levelId);
  }
}
