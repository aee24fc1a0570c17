/**
 * Critical Zones
 *
 * Column ranges on each tier that must stay hazard-free: the takeoff and
 * landing columns between tiers, and the tiles around trophy and exit.
 */

import type { TilePoint } from "../../core/grid";
import type { Landmarks } from "../../pipeline/types";

const JUMP_ZONE_MARGIN = 2;
const FEATURE_ZONE_MARGIN = 1;

/**
 * Inclusive column range on a tier row.
 */
export interface CriticalZone {
  readonly tier: number;
  readonly from: number;
  readonly to: number;
  readonly reason: string;
}

export interface CriticalLandmarks {
  readonly landmarks: Landmarks;
  readonly trophy: TilePoint;
  readonly exit: TilePoint;
}

function zone(
  tier: number,
  center: number,
  margin: number,
  reason: string,
): CriticalZone {
  return {
    tier,
    from: Math.max(center - margin, 0),
    to: center + margin,
    reason,
  };
}

/**
 * Every critical zone for a level. Jump corridors protect both tiers they
 * connect.
 */
export function buildCriticalZones({
  landmarks,
  trophy,
  exit,
}: CriticalLandmarks): CriticalZone[] {
  const lowerCorridor = Math.max(
    landmarks.secondTierStart,
    landmarks.firstTierStart,
  );

  return [
    zone(16, lowerCorridor, JUMP_ZONE_MARGIN, "jump 16 to 12"),
    zone(12, lowerCorridor, JUMP_ZONE_MARGIN, "jump 16 to 12"),
    zone(12, landmarks.thirdTierEnd, JUMP_ZONE_MARGIN, "jump 12 to 8"),
    zone(8, landmarks.thirdTierEnd, JUMP_ZONE_MARGIN, "jump 12 to 8"),
    zone(8, landmarks.topTierStart, JUMP_ZONE_MARGIN, "jump 8 to 4"),
    zone(4, landmarks.topTierStart, JUMP_ZONE_MARGIN, "jump 8 to 4"),
    zone(4, trophy.x, FEATURE_ZONE_MARGIN, "trophy"),
    zone(exit.y + 1, exit.x, FEATURE_ZONE_MARGIN, "exit"),
  ];
}

export function isInCriticalZone(
  zones: readonly CriticalZone[],
  tier: number,
  column: number,
): boolean {
  return zones.some((z) => z.tier === tier && column >= z.from && column <= z.to);
}
