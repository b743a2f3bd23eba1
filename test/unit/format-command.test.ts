import { formatCommand } from '../../src/utils/format-command';
import { formatFilename } from '../../src/utils/format-filename';

describe('formatCommand', () => {
  it('masks secret values inside arguments', () => {
    expect(formatCommand('mongodump', ['--username=ro', '--password=test-password'], ['test-password'])).toBe(
      'mongodump --username=ro --password=****',
    );
  });

  it('quotes arguments containing spaces', () => {
    expect(formatCommand('tar', ['--file=/tmp/my dump.tgz', '.'])).toBe('tar "--file=/tmp/my dump.tgz" .');
  });

  it('ignores empty secrets', () => {
    expect(formatCommand('age', ['--output=x'], [''])).toBe('age --output=x');
  });
});

describe('formatFilename', () => {
  it('substitutes the timestamp placeholder', () => {
    expect(formatFilename('dump-{timestamp}', 1700000000)).toBe('dump-1700000000');
    expect(formatFilename('orders-{timestamp}', 5)).toBe('orders-5');
  });
});
