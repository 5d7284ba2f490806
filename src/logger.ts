type Level = 'INFO' | 'WARN' | 'ERROR';

function write(level: Level, message: string): void {
  const line = `${new Date().toISOString()} ${level} ${message}\n`;
  if (level === 'INFO') {
    process.stdout.write(line);
  } else {
    process.stderr.write(line);
  }
}

export const log = {
  info: (message: string): void => write('INFO', message),
  warn: (message: string): void => write('WARN', message),
  error: (message: string): void => write('ERROR', message),
};
