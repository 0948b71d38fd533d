import { AGENT_RADIUS, Environment, MAX_ALTITUDE } from "../simulation/Environment.js";
import { Vec3, add, clamp, scale, sub, length } from "../simulation/geometry.js";
import { AgentRole, AgentSnapshot } from "../simulation/types.js";

export type RoleSpeeds = Record<AgentRole, number>;

/**
 * Stand-in for the flight stack: moves each agent straight toward its target
 * at a fixed speed and refuses steps that would enter an obstacle.
 */
export class KinematicMotion {
  private readonly environment: Environment;
  private readonly speeds: RoleSpeeds;
  private readonly current = new Map<number, Vec3>();

  constructor(environment: Environment, speeds: RoleSpeeds) {
    this.environment = environment;
    this.speeds = speeds;
  }

  place(agents: readonly AgentSnapshot[]) {
    for (const agent of agents) {
      this.current.set(agent.id, { ...agent.position });
    }
  }

  positions(): ReadonlyMap<number, Vec3> {
    return this.current;
  }

  advance(agents: readonly AgentSnapshot[], dt: number) {
    const half = this.environment.halfExtent;
    for (const agent of agents) {
      const position = this.current.get(agent.id);
      if (!position || !agent.target || agent.caught) continue;

      const offset = sub(agent.target, position);
      const remaining = length(offset);
      const stepLength = this.speeds[agent.role] * dt;
      if (remaining < 1e-9 || stepLength <= 0) continue;

      const moved = remaining <= stepLength ? { ...agent.target } : add(position, scale(offset, stepLength / remaining));
      const next = {
        x: clamp(moved.x, -half, half),
        y: clamp(moved.y, 0, MAX_ALTITUDE),
        z: clamp(moved.z, -half, half),
      };
      if (this.environment.checkCollision(next, AGENT_RADIUS)) continue;
      this.current.set(agent.id, next);
    }
  }
}
