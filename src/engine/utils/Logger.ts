import { EventBus } from './EventBus';
import { ENGINE_CONFIG } from '@/config';

export type LogClass = 'calc' | 'speed' | 'matchup' | 'cache' | 'rank' | 'system' | 'warn';

const CLASS_MAP: Record<LogClass, string> = {
  calc:    'lc',
  speed:   'lsp',
  matchup: 'lm',
  cache:   'lch',
  rank:    'lr',
  system:  'ls',
  warn:    'lw',
};

export const Logger = {
  log(text: string, type: LogClass = 'system'): void {
    if (ENGINE_CONFIG.logToConsole) {
      const line = `[${type.toUpperCase()}] ${text}`;
      if (type === 'warn') console.warn(line);
      else console.log(line);
    }
    EventBus.emit('logMessage', { text, cls: CLASS_MAP[type] });
  },
};
