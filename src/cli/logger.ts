import dayjs from 'dayjs';
import { createLogger, type Logger } from '../log.js';
import { ui as defaultUi, type Ui } from './ui.js';

type Data = Record<string, unknown>;

const ts = () => dayjs().format('YYYY-MM-DD HH:mm:ss');

export type CliLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

/**
 * Structured records go to pino; warnings and errors are also echoed to the terminal.
 */
export function createCliLog(scope: string, ui: Ui = defaultUi, logger: Logger = createLogger()): CliLog {
  const child = logger.child({ scope });
  return {
    info: (msg, data) => child.info({ data }, msg),
    warn: (msg, data) => {
      ui.say(`${ts()} ${msg}`, 'warn');
      child.warn({ data }, msg);
    },
    error: (msg, data) => {
      ui.say(`${ts()} ${msg}`, 'error');
      child.error({ data }, msg);
    },
    debug: (msg, data) => child.debug({ data }, msg),
  };
}
