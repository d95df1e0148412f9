import chalk from 'chalk';

export type Palette = {
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
  accent: (s: string) => string;
};

export function colorEnabled(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): boolean {
  return !(env.NO_COLOR && env.NO_COLOR !== '0') && !argv.includes('--no-color');
}

export function getPalette(noColor = !colorEnabled()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  const theme = (process.env.CLI_THEME || 'neo').toLowerCase();
  if (theme === 'mono') {
    return {
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
      accent: c.bold,
    };
  }
  if (theme === 'solarized') {
    return {
      info: c.cyan,
      success: c.green,
      warn: c.yellow,
      error: c.red,
      dim: c.gray,
      accent: c.blue,
    };
  }
  // neo (default)
  return {
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
    accent: c.magentaBright,
  };
}
