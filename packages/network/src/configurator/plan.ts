/**
 * A configuration plan is an ordered list of shell commands run inside
 * one node. `await` actions are probes repeated until they exit 0.
 */
export type ConfigAction =
  | { kind: "run"; command: string }
  | { kind: "await"; command: string };

export type ConfigPlan = ConfigAction[];

export const run = (command: string): ConfigAction => ({ kind: "run", command });

export const awaitReady = (command: string): ConfigAction => ({ kind: "await", command });

export const sysctl = (key: string, value: string | number): ConfigAction =>
  run(`sysctl -w ${key}=${value}`);

export function commandsOf(plan: ConfigPlan): string[] {
  return plan.map((action) => action.command);
}
