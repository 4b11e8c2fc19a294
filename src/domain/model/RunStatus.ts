export const RunStatus = {
  CREATED: 'CREATED',
  DISCOVERING: 'DISCOVERING',
  INSPECTING: 'INSPECTING',
  LOADING: 'LOADING',
  CHECKING: 'CHECKING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.DISCOVERING, RunStatus.FAILED],
  [RunStatus.DISCOVERING]: [RunStatus.INSPECTING, RunStatus.COMPLETED, RunStatus.FAILED],
  [RunStatus.INSPECTING]: [RunStatus.LOADING, RunStatus.FAILED],
  [RunStatus.LOADING]: [RunStatus.CHECKING, RunStatus.FAILED],
  [RunStatus.CHECKING]: [RunStatus.COMPLETED, RunStatus.FAILED],
  [RunStatus.COMPLETED]: [],
  [RunStatus.FAILED]: [],
};

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
