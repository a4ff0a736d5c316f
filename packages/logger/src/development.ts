import pretty from 'pino-pretty';

// createLoggerOptions renames Nest's `context` to `caller` in pretty mode
export const developmentPrettyOptions: pretty.PrettyOptions = {
  translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
  ignore: 'hostname,pid',
  customPrettifiers: {
    caller: (caller, _key, _log, { colors }) =>
      colors.bold(colors.yellowBright(caller.toString())),
  },
};

const development = (opts: pretty.PrettyOptions) =>
  pretty({
    ...opts,
    ...developmentPrettyOptions,
  });

export default development;
