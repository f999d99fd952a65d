import { ApiError } from "../../lib/errors.ts";
import { logger } from "../../lib/logger.ts";
import type { AppDefinition, BoardRef, TilePlacement } from "../types.ts";
import type { DashboardApi } from "./homarr.ts";

const log = logger("tiles");

export interface TileRequest {
  id: string;
  app: AppDefinition;
  placement: TilePlacement;
}

export interface ProvisionedTile {
  tileId: string;
}

/**
 * Creates the app and places it on the board. A conflict means an earlier run
 * created the app without recording it: the existing app with the same URL is
 * adopted instead of creating a duplicate.
 */
export async function provisionTile(
  client: DashboardApi,
  board: BoardRef,
  req: TileRequest,
): Promise<ProvisionedTile> {
  const created = await client.createApp(req.app);

  let tileId: string;
  if (created.status === "created") {
    tileId = created.appId;
  } else {
    const existing = (await client.listApps()).find((a) => a.href === req.app.href);
    if (!existing) {
      throw new ApiError(
        "conflict",
        `App "${req.app.name}" conflicts with an existing app that has a different URL`,
        409,
      );
    }
    log.info("Adopting existing app {tileId} for {id}", { tileId: existing.id, id: req.id });
    tileId = existing.id;
  }

  await client.attachAppToBoard(tileId, board, req.placement);
  return { tileId };
}
