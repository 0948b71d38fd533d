import { Environment } from "./Environment.js";
import { Vec3, add, distance, normalize, scale, sub } from "./geometry.js";
import {
  Agent,
  AgentRole,
  BehaviorMemory,
  BehaviorState,
  GameRules,
  HiderAgent,
  HiderBehavior,
  HidingSpot,
  SeekerAgent,
  SeekerBehavior,
} from "./types.js";

export const PATROL_ALTITUDE = 5;
const PATROL_GRID_SIDE = 3;
const PATROL_EDGE_MARGIN = 10;
const FLEE_EDGE_MARGIN = 5;

// Hiding-spot scoring weights.
const DISTANCE_PENALTY = 0.5;
const THREAT_PENALTY = 1;

export interface Sighting {
  id: number;
  position: Vec3;
}

export interface BehaviorContext {
  environment: Environment;
  rules: GameRules;
  waypoints: readonly Vec3[];
}

export interface BehaviorDecision<S extends BehaviorState = BehaviorState> {
  target: Vec3;
  state: S;
  memory: BehaviorMemory;
}

export type Controller<A extends Agent, S extends BehaviorState> = (
  agent: Readonly<A>,
  context: BehaviorContext,
  enemies: readonly Sighting[],
  dt: number,
) => BehaviorDecision<S>;

export function initialMemory(waypointIndex = 0): BehaviorMemory {
  return { target: null, sinceRetarget: 0, waypointIndex };
}

export function initialSeekerBehavior(): SeekerBehavior {
  return SeekerBehavior.Patrol;
}

export function initialHiderBehavior(): HiderBehavior {
  return HiderBehavior.Hide;
}

/** Caught is absorbing: no transition leaves it. */
export function nextHiderBehavior(current: HiderBehavior, desired: HiderBehavior): HiderBehavior {
  return current === HiderBehavior.Caught ? HiderBehavior.Caught : desired;
}

/** Grid of waypoints covering the arena, ordered by x then z. */
export function patrolWaypoints(playAreaSize: number): Vec3[] {
  const half = playAreaSize / 2;
  const margin = Math.min(PATROL_EDGE_MARGIN, half / 2);
  const span = playAreaSize - 2 * margin;
  const points: Vec3[] = [];
  for (let i = 0; i < PATROL_GRID_SIDE; i++) {
    for (let j = 0; j < PATROL_GRID_SIDE; j++) {
      points.push({
        x: -half + margin + (i / (PATROL_GRID_SIDE - 1)) * span,
        y: PATROL_ALTITUDE,
        z: -half + margin + (j / (PATROL_GRID_SIDE - 1)) * span,
      });
    }
  }
  return points;
}

/** Closest sighting by Euclidean distance; ties go to the lowest id. */
export function nearest(from: Vec3, sightings: readonly Sighting[]): Sighting | null {
  let best: Sighting | null = null;
  let bestDist = Infinity;
  for (const s of sightings) {
    const d = distance(from, s.position);
    if (d < bestDist || (d === bestDist && best !== null && s.id < best.id)) {
      best = s;
      bestDist = d;
    }
  }
  return best;
}

export const updateSeeker: Controller<SeekerAgent, SeekerBehavior> = (agent, context, visibleHiders, dt) => {
  const { memory } = agent;
  const sinceRetarget = memory.sinceRetarget + dt;
  const quarry = nearest(agent.position, visibleHiders);

  if (quarry) {
    const target = { ...quarry.position };
    return { target, state: SeekerBehavior.Chase, memory: { ...memory, target, sinceRetarget } };
  }

  const { waypoints, rules } = context;
  if (waypoints.length > 0 && (memory.target === null || sinceRetarget > rules.patrolUpdateInterval)) {
    const index = memory.waypointIndex % waypoints.length;
    const target = { ...waypoints[index] };
    return {
      target,
      state: SeekerBehavior.Patrol,
      memory: { target, sinceRetarget: 0, waypointIndex: (index + 1) % waypoints.length },
    };
  }

  const target = memory.target ?? { ...agent.position };
  return { target, state: SeekerBehavior.Patrol, memory: { ...memory, target, sinceRetarget } };
};

export function fleeTarget(from: Vec3, threat: Vec3, environment: Environment, fleeDistance: number): Vec3 {
  const direction =
    normalize(sub(from, threat)) ?? normalize({ x: from.x, y: 0, z: from.z }) ?? { x: 1, y: 0, z: 0 };
  return environment.clampToFlightVolume(add(from, scale(direction, fleeDistance)), FLEE_EDGE_MARGIN);
}

export function scoreHidingSpot(
  spot: HidingSpot,
  from: Vec3,
  seekers: readonly Sighting[],
  rules: GameRules,
  playAreaSize: number,
): number {
  const travel = (DISTANCE_PENALTY * distance(from, spot.position)) / playAreaSize;
  const threat = seekers.reduce(
    (acc, s) => acc + Math.max(0, 1 - distance(spot.position, s.position) / rules.seekerVisionRange),
    0,
  );
  return spot.quality - travel - THREAT_PENALTY * threat;
}

export function bestHidingSpot(
  from: Vec3,
  spots: readonly HidingSpot[],
  seekers: readonly Sighting[],
  rules: GameRules,
  playAreaSize: number,
): HidingSpot | null {
  let best: HidingSpot | null = null;
  let bestScore = -Infinity;
  for (const spot of spots) {
    const score = scoreHidingSpot(spot, from, seekers, rules, playAreaSize);
    if (score > bestScore) {
      best = spot;
      bestScore = score;
    }
  }
  return best;
}

export const updateHider: Controller<HiderAgent, HiderBehavior> = (agent, context, seekers, dt) => {
  const { memory } = agent;

  if (agent.caught || agent.behavior === HiderBehavior.Caught) {
    const target = { ...agent.position };
    return { target, state: HiderBehavior.Caught, memory: { ...memory, target } };
  }

  const { environment, rules } = context;
  const sinceRetarget = memory.sinceRetarget + dt;
  const threat = nearest(agent.position, seekers);
  const threatened = threat !== null && distance(agent.position, threat.position) <= rules.fleeTriggerDistance;

  if (agent.detected || threatened) {
    const target = threat
      ? fleeTarget(agent.position, threat.position, environment, rules.fleeDistance)
      : (memory.target ?? { ...agent.position });
    return {
      target,
      state: nextHiderBehavior(agent.behavior, HiderBehavior.Flee),
      memory: { ...memory, target, sinceRetarget },
    };
  }

  if (memory.target === null || sinceRetarget > rules.hiderUpdateInterval) {
    const spot = bestHidingSpot(agent.position, environment.hidingSpots, seekers, rules, environment.playAreaSize);
    if (spot) {
      const target = { ...spot.position };
      return {
        target,
        state: nextHiderBehavior(agent.behavior, HiderBehavior.Hide),
        memory: { ...memory, target, sinceRetarget: 0 },
      };
    }
  }

  const target = memory.target ?? { ...agent.position };
  return {
    target,
    state: nextHiderBehavior(agent.behavior, HiderBehavior.Hide),
    memory: { ...memory, target, sinceRetarget },
  };
};

/** Controller per role. Seekers see visible hiders; hiders see every known seeker. */
export const CONTROLLERS = {
  [AgentRole.Seeker]: updateSeeker,
  [AgentRole.Hider]: updateHider,
} as const;
