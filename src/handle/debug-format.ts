import { Backtrace } from '../backtrace/backtrace';
import { BACKTRACE_ENV_VAR } from '../config/backtrace-config';

export const DISABLED_BACKTRACE_NOTICE =
  `backtrace disabled; run with ${BACKTRACE_ENV_VAR}=1 environment variable ` +
  'to display a backtrace';

/**
 * Multi-line diagnostic rendering: the root, its numbered causes, then the
 * backtrace section.
 */
export function formatDebug(chain: readonly string[], backtrace: Backtrace): string {
  const [root, ...causes] = chain;
  let out = `${root}\n`;

  if (causes.length > 0) {
    out += '\ncaused by:\n';
    causes.forEach((cause, index) => {
      out += `\t${index}: ${cause}\n`;
    });
  }

  switch (backtrace.status) {
    case 'captured':
      out += `\n${backtrace}\n`;
      break;
    case 'disabled':
      out += `\n${DISABLED_BACKTRACE_NOTICE}\n`;
      break;
    default:
      break;
  }

  return out;
}
