import {
  PipelineStepError,
  maskSecret,
  maskSecretsInMessage,
  runCanceledError,
  toTypedError,
} from '../../src/domain/errors';

describe('PipelineStepError', () => {
  test('code follows the failure kind', () => {
    expect(new PipelineStepError('packaging', 'boom').code).toBe('BUILD.PACKAGING');
    expect(new PipelineStepError('tag_conflict', 'exists').code).toBe('RELEASE.TAG_CONFLICT');
  });
});

describe('toTypedError', () => {
  test('keeps the kind, reason and retryability of a step error', () => {
    const err = new PipelineStepError('dependency', 'pip failed', { retryable: true, reason: 'NetworkError' });
    const typed = toTypedError(err, 'checkout', { platformId: 'linux', stepId: 'install', runId: 'run_1' });

    expect(typed.code).toBe('BUILD.DEPENDENCY');
    expect(typed.message).toBe('pip failed');
    expect(typed.retryable).toBe(true);
    expect(typed.platformId).toBe('linux');
    expect(typed.stepId).toBe('install');
    expect(typed.runId).toBe('run_1');
    expect(typed.details).toEqual({ reason: 'NetworkError' });
  });

  test('records other errors under the fallback kind', () => {
    const typed = toTypedError(new Error('disk full'), 'upload');
    expect(typed.code).toBe('BUILD.UPLOAD');
    expect(typed.message).toBe('disk full');
    expect(typed.retryable).toBe(false);
  });

  test('stringifies non-error values', () => {
    expect(toTypedError('bad', 'host').message).toBe('bad');
  });

  test('attaches suggested fixes for auth failures', () => {
    const typed = toTypedError(new PipelineStepError('auth', 'denied'), 'host');
    expect(typed.suggestedFixes.map((f) => f.type)).toEqual(['CHECK_TOKEN']);
  });
});

describe('runCanceledError', () => {
  test('includes the reason when given', () => {
    expect(runCanceledError('run_1', 'Superseded').message).toBe('Run canceled: Superseded');
    expect(runCanceledError('run_1').message).toBe('Run canceled');
  });
});

describe('secret masking', () => {
  test('keeps the last four characters of long secrets', () => {
    expect(maskSecret('test-secret')).toBe('*******cret');
  });

  test('fully masks short secrets', () => {
    expect(maskSecret('abc')).toBe('****');
  });

  test('masks every occurrence in a message', () => {
    expect(maskSecretsInMessage('token test-secret rejected (test-secret)', ['test-secret'])).toBe(
      'token *******cret rejected (*******cret)',
    );
  });
});
