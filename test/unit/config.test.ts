import { REQUIRED_ENV_VARS } from '../../src/config/config.schema';
import { Config } from '../../src/infrastructure/config';
import { ConfigurationError } from '../../src/infrastructure/errors';
import { silenceConsole, testLogger, validEnv } from '../helpers/fixtures';

describe('Config', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('maps the environment into the nested configuration', () => {
    const config = new Config(validEnv({ PATH: '/usr/bin' }), testLogger()).parsed;

    expect(config).toEqual({
      mongo: {
        uri: 'mongodb://db.example.internal:27017',
        database: 'shop',
        collection: 'orders',
        username: 'backup-ro',
        password: 'test-password',
        authenticationDatabase: 'admin',
      },
      storage: {
        service: 'r2',
        bucket: 'backups',
        path: '/mongo/shop',
        rcloneConfigPath: '/etc/rclone/rclone.conf',
      },
      encryption: { recipient: 'age1testrecipient' },
      retentionPeriod: '7d',
      dumpNameFormat: 'dump-{timestamp}',
      tools: { mongodump: 'mongodump', tar: 'tar', age: 'age', rclone: 'rclone' },
    });
  });

  it('is immutable', () => {
    const config = new Config(validEnv(), testLogger()).parsed;

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('freezes every nested group', () => {
    const config = new Config(validEnv(), testLogger()).parsed;

    expect(Object.isFrozen(config.mongo)).toBe(true);
    expect(Object.isFrozen(config.storage)).toBe(true);
    expect(Object.isFrozen(config.encryption)).toBe(true);
    expect(Object.isFrozen(config.tools)).toBe(true);
    expect(() => {
      config.mongo.password = 'changed';
    }).toThrow(TypeError);
    expect(config.mongo.password).toBe('test-password');
  });

  it('honours tool path and name format overrides', () => {
    const config = new Config(
      validEnv({ AGE_PATH: '/opt/age/age', RCLONE_PATH: '/opt/rclone', DUMP_NAME_FORMAT: 'orders-{timestamp}' }),
      testLogger(),
    ).parsed;

    expect(config.tools.age).toBe('/opt/age/age');
    expect(config.tools.rclone).toBe('/opt/rclone');
    expect(config.dumpNameFormat).toBe('orders-{timestamp}');
  });

  it('does not validate the retention format', () => {
    const config = new Config(validEnv({ RETENTION_PERIOD: '7x' }), testLogger()).parsed;

    expect(config.retentionPeriod).toBe('7x');
  });

  it.each(REQUIRED_ENV_VARS.map((name) => [name]))('fails when %s is unset', (name) => {
    const env = validEnv();
    delete env[name];

    expect(() => new Config(env, testLogger())).toThrow(new ConfigurationError(`Missing environment variable: ${name}`));
  });

  it.each(REQUIRED_ENV_VARS.map((name) => [name]))('fails when %s is empty', (name) => {
    expect(() => new Config(validEnv({ [name]: '' }), testLogger())).toThrow(
      `Missing environment variable: ${name}`,
    );
  });

  it('reports every missing variable', () => {
    const env = validEnv({ MONGO_DB: '' });
    delete env.OSS;

    expect(() => new Config(env, testLogger())).toThrow(
      'Missing environment variable: OSS; Missing environment variable: MONGO_DB',
    );
  });

  it('rejects a name format without a trailing timestamp', () => {
    expect(() => new Config(validEnv({ DUMP_NAME_FORMAT: '{timestamp}-dump' }), testLogger())).toThrow(
      'DUMP_NAME_FORMAT must be a file name ending in "-{timestamp}"',
    );
  });
});
