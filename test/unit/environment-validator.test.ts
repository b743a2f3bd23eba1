import { ConfigurationError } from '../../src/infrastructure/errors';
import { EnvironmentValidator } from '../../src/modules/backup/stages/environment-validator';
import { FakeToolRunner } from '../helpers/fake-tool-runner';
import { silenceConsole, testLogger, validEnv } from '../helpers/fixtures';

describe('EnvironmentValidator', () => {
  let runner: FakeToolRunner;

  beforeEach(() => {
    silenceConsole();
    runner = new FakeToolRunner();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns the configuration once every tool resolves', () => {
    const config = new EnvironmentValidator(runner, testLogger()).validate(validEnv());

    expect(config.mongo.collection).toBe('orders');
    expect(runner.availabilityChecks).toEqual(['rclone', 'mongodump', 'age']);
    expect(runner.calls).toEqual([]);
  });

  it('names the first missing tool', () => {
    runner.markMissing('mongodump').markMissing('age');

    expect(() => new EnvironmentValidator(runner, testLogger()).validate(validEnv())).toThrow(
      new ConfigurationError('mongodump is not installed. Aborting.'),
    );
  });

  it('checks configured tool paths', () => {
    new EnvironmentValidator(runner, testLogger()).validate(validEnv({ AGE_PATH: '/opt/age/age' }));

    expect(runner.availabilityChecks).toEqual(['rclone', 'mongodump', '/opt/age/age']);
  });

  it('stops at missing configuration before looking for tools', () => {
    const env = validEnv();
    delete env.ENCRYPTION_PUBLIC_KEY;

    expect(() => new EnvironmentValidator(runner, testLogger()).validate(env)).toThrow(ConfigurationError);
    expect(runner.availabilityChecks).toEqual([]);
    expect(runner.calls).toEqual([]);
  });
});
