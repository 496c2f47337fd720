import { getGenerator } from "../generators";
import type { DungeonMap } from "../model/dungeon-map";
import {
  checkFloorFootprint,
  checkRoomBounds,
  checkRoomConnectivity,
  checkRoomFloors,
  checkRoomOverlap,
} from "../passes/validation/invariant-checks";
import type { Violation } from "../pipeline/types";
import { hasErrorViolations, type MapValidationResult } from "./result-types";

/**
 * Validate a generated map against its structural invariants.
 *
 * Checks:
 * - Rooms lie inside the map and are fully floor
 * - All rooms are reachable from the spawn room
 * - For rectangular layouts: no padded overlap, and no floor outside
 *   rooms and corridors
 */
export function validateDungeonMap(map: DungeonMap): MapValidationResult {
  const rules = getGenerator(map.template.algorithm).layoutRules(map.template);
  const violations: Violation[] = [
    ...checkRoomBounds(map),
    ...checkRoomFloors(map),
    ...checkRoomConnectivity(map),
  ];

  if (map.rooms.length === 0) {
    violations.push({
      type: "invariant.room.count",
      message: "Map has no rooms",
      severity: "error",
    });
  }

  if (rules.rectangular) {
    violations.push(...checkRoomOverlap(map, rules.roomPadding));
    violations.push(...checkFloorFootprint(map));
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
