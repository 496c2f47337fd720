/**
 * BSP Generator Passes
 *
 * partition -> place rooms -> connect rooms
 */

import { GenerationTimeoutError, type SeededRandom } from "@wyrmhold/contracts";
import { manhattanDistance, rectCenter } from "../../core/geometry/operations";
import type { Rect } from "../../core/geometry/types";
import { Grid } from "../../core/grid/grid";
import { TileType } from "../../core/grid/types";
import type { Corridor } from "../../model/corridor";
import type { RoomShape } from "../../model/room";
import { connectRooms } from "../../passes/carving/corridor-router";
import type {
  EmptyArtifact,
  LayoutArtifact,
  Pass,
  TraceCollector,
} from "../../pipeline/types";
import {
  BSP_CORRIDORS_PASS,
  BSP_PARTITION_PASS,
  BSP_ROOMS_PASS,
  SPLIT_AXES,
  type SplitAxis,
} from "./constants";
import type { ResolvedBSPParams } from "./generator";

// =============================================================================
// ARTIFACTS
// =============================================================================

/**
 * Node of the partition tree. Leaves have no children.
 */
export interface BSPNode extends Rect {
  readonly depth: number;
  readonly children?: readonly [BSPNode, BSPNode];
  readonly room?: RoomShape;
}

export interface BSPTreeArtifact {
  readonly type: "bsp-tree";
  readonly width: number;
  readonly height: number;
  readonly root: BSPNode;
  readonly leafCount: number;
}

export interface BSPRoomsArtifact {
  readonly type: "bsp-rooms";
  readonly grid: Grid;
  readonly root: BSPNode;
  readonly rooms: readonly RoomShape[];
}

// =============================================================================
// PARTITION
// =============================================================================

/**
 * Pick the split axis for a node, or undefined when it is a leaf.
 */
function chooseSplitAxis(
  node: Rect,
  params: ResolvedBSPParams,
  rng: SeededRandom,
): SplitAxis | undefined {
  const canSplitX = node.width >= params.minLeafSize * 2;
  const canSplitY = node.height >= params.minLeafSize * 2;

  if (canSplitX && canSplitY) {
    if (node.width > node.height) return "x";
    if (node.height > node.width) return "y";
    return rng.choice(SPLIT_AXES);
  }
  if (canSplitX) return "x";
  if (canSplitY) return "y";
  return undefined;
}

function splitNode(
  node: Rect,
  depth: number,
  params: ResolvedBSPParams,
  rng: SeededRandom,
  trace: TraceCollector,
): BSPNode {
  if (depth >= params.maxDepth) {
    return { ...node, depth };
  }

  const axis = chooseSplitAxis(node, params, rng);
  if (!axis) {
    return { ...node, depth };
  }

  const size = axis === "x" ? node.width : node.height;
  const at = rng.nextInt(params.minLeafSize, size - params.minLeafSize);

  trace.decision(BSP_PARTITION_PASS, {
    kind: "split",
    node,
    axis,
    at,
    drawn: node.width === node.height,
  });

  const [first, second]: [Rect, Rect] =
    axis === "x"
      ? [
          { x: node.x, y: node.y, width: at, height: node.height },
          {
            x: node.x + at,
            y: node.y,
            width: node.width - at,
            height: node.height,
          },
        ]
      : [
          { x: node.x, y: node.y, width: node.width, height: at },
          {
            x: node.x,
            y: node.y + at,
            width: node.width,
            height: node.height - at,
          },
        ];

  const left = splitNode(first, depth + 1, params, rng, trace);
  const right = splitNode(second, depth + 1, params, rng, trace);
  return { ...node, depth, children: [left, right] };
}

function countLeaves(node: BSPNode): number {
  if (!node.children) return 1;
  return countLeaves(node.children[0]) + countLeaves(node.children[1]);
}

/**
 * Recursively partition the map rectangle.
 *
 * @throws GenerationTimeoutError when the bounds leave fewer leaves than
 * `minRoomCount`
 */
export function partition(
  params: ResolvedBSPParams,
): Pass<EmptyArtifact, BSPTreeArtifact> {
  return {
    id: BSP_PARTITION_PASS,
    run(input, ctx) {
      const root = splitNode(
        { x: 0, y: 0, width: input.width, height: input.height },
        0,
        params,
        ctx.rng,
        ctx.trace,
      );
      const leafCount = countLeaves(root);

      if (leafCount < params.minRoomCount) {
        throw new GenerationTimeoutError(
          `Partitioning stopped with ${leafCount} leaves, ${params.minRoomCount} rooms required`,
          {
            leaves: leafCount,
            minRoomCount: params.minRoomCount,
            maxDepth: params.maxDepth,
          },
        );
      }

      return {
        type: "bsp-tree",
        width: input.width,
        height: input.height,
        root,
        leafCount,
      };
    },
  };
}

// =============================================================================
// ROOMS
// =============================================================================

/**
 * Place one room per leaf, left to right. Room ids follow leaf order.
 */
export function placeRooms(
  params: ResolvedBSPParams,
): Pass<BSPTreeArtifact, BSPRoomsArtifact> {
  return {
    id: BSP_ROOMS_PASS,
    run(input, ctx) {
      const grid = Grid.walls(input.width, input.height);
      const rooms: RoomShape[] = [];
      const padding = params.roomPadding;

      const visit = (node: BSPNode): BSPNode => {
        if (node.children) {
          const left = visit(node.children[0]);
          const right = visit(node.children[1]);
          return { ...node, children: [left, right] };
        }

        const maxWidth = node.width - padding * 2;
        const maxHeight = node.height - padding * 2;
        const width = ctx.rng.nextInt(params.minRoomSize, maxWidth);
        const height = ctx.rng.nextInt(params.minRoomSize, maxHeight);
        const room: RoomShape = {
          id: rooms.length,
          x: node.x + padding + ctx.rng.nextInt(0, maxWidth - width),
          y: node.y + padding + ctx.rng.nextInt(0, maxHeight - height),
          width,
          height,
        };

        grid.fillRect(room.x, room.y, room.width, room.height, TileType.FLOOR);
        rooms.push(room);
        return { ...node, room };
      };

      const root = visit(input.root);
      ctx.trace.decision(BSP_ROOMS_PASS, {
        kind: "rooms-placed",
        leaves: input.leafCount,
        rooms: rooms.length,
      });

      return { type: "bsp-rooms", grid, root, rooms };
    },
  };
}

// =============================================================================
// CORRIDORS
// =============================================================================

/**
 * Closest pair across two room lists by center distance.
 * The first pair found wins ties.
 */
function nearestPair(
  left: readonly RoomShape[],
  right: readonly RoomShape[],
): [RoomShape, RoomShape] | undefined {
  let best: [RoomShape, RoomShape] | undefined;
  let bestDistance = Infinity;

  for (const a of left) {
    const ca = rectCenter(a);
    for (const b of right) {
      const distance = manhattanDistance(ca, rectCenter(b));
      if (distance < bestDistance) {
        bestDistance = distance;
        best = [a, b];
      }
    }
  }
  return best;
}

/**
 * Connect sibling subtrees while unwinding, so the map is connected by
 * construction.
 */
export function connectSubtrees(): Pass<BSPRoomsArtifact, LayoutArtifact> {
  return {
    id: BSP_CORRIDORS_PASS,
    run(input, ctx) {
      const corridors: Corridor[] = [];

      const visit = (node: BSPNode): RoomShape[] => {
        if (!node.children) {
          return node.room ? [node.room] : [];
        }

        const left = visit(node.children[0]);
        const right = visit(node.children[1]);
        const pair = nearestPair(left, right);
        if (pair) {
          corridors.push(connectRooms(input.grid, pair[0], pair[1], ctx.rng));
        }
        return [...left, ...right];
      };

      visit(input.root);

      return {
        type: "layout",
        grid: input.grid,
        rooms: input.rooms,
        corridors,
        warnings: [],
      };
    },
  };
}
