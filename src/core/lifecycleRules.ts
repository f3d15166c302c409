import type { ActiveStatus, IssueStatus } from "../types.js";

/** Forward-only lifecycle. Rejection is open from every non-terminal state. */
export const TRANSITIONS: Readonly<Record<IssueStatus, readonly IssueStatus[]>> = {
  reported: ["acknowledged", "rejected"],
  acknowledged: ["in_progress", "rejected"],
  in_progress: ["resolved", "rejected"],
  resolved: [],
  rejected: []
};

export function canTransition(from: IssueStatus, to: IssueStatus) {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: IssueStatus) {
  return TRANSITIONS[status].length === 0;
}

export function isActive(status: IssueStatus): status is ActiveStatus {
  return !isTerminal(status);
}
