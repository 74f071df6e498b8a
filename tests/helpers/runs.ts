import { EntryStatus, PipelineRun, PipelineState } from '../../src/domain/run';

export function createMockRun(overrides?: Partial<PipelineRun>): PipelineRun {
  return {
    id: 'run_1',
    trigger: { eventType: 'push-to-tag', ref: 'refs/tags/v1.0.0' },
    definitionName: 'junior',
    state: PipelineState.BuildRunning,
    releaseEligible: true,
    entries: {
      linux: { platformId: 'linux', artifactName: 'junior-linux', status: EntryStatus.Running, steps: [] },
    },
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}
