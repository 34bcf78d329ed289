import { formatConsoleLine } from '../src/utils/logger';

describe('console log format', () => {
  it('should render metadata as key=value pairs after the message', () => {
    const line = formatConsoleLine({
      level: 'info',
      message: 'Install finished',
      timestamp: '12:00:00',
      service: 'instance-sync',
      planned: 3,
      versionId: '1.20.4',
      url: 'https://files.test/a b',
      hash: undefined,
    });

    expect(line).toBe('12:00:00 info Install finished planned=3 versionId=1.20.4 url="https://files.test/a b"');
  });

  it('should serialize structured values as JSON', () => {
    const line = formatConsoleLine({
      level: 'warn',
      message: 'Download failed',
      timestamp: '12:00:01',
      data: { attempts: 3 },
      error: '',
    });

    expect(line).toBe('12:00:01 warn Download failed data={"attempts":3} error=""');
  });

  it('should put the stack trace below the line', () => {
    const line = formatConsoleLine({
      level: 'error',
      message: 'boom',
      timestamp: '12:00:02',
      stack: 'Error: boom\n    at run',
    });

    expect(line).toBe('12:00:02 error boom\nError: boom\n    at run');
  });
});
