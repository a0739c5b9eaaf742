// Structured logging for the service.
import { Logger, type ILogObj } from 'tslog';

export const logger = new Logger<ILogObj>({
  name: 'fare-window',
  minLevel: 3, // info
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: process.env.NODE_ENV === 'test' ? 'hidden' : 'pretty',
});
