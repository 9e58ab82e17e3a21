import * as winston from 'winston';

// הרחבת טיפוסים כדי ש-TypeScript יזהה את השדות המותאמים ב-info
declare module 'winston' {
  namespace Logform {
    interface TransformableInfo {
      environment?: string;
      module?: string;
      label?: string;
    }
  }
}

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4
};

export type LogLevel = keyof typeof logLevels;

/**
 * לוגר winston עם מתודות לרמות המותאמות (trace, debug וכו').
 */
export type ModuleLogger = winston.Logger & {
  [level in LogLevel]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta'
};

winston.addColors(logColors);

// --- פורמטים ---

const splitModuleList = (value: string | undefined): string[] =>
  (value ?? '').split(',').map(m => m.trim()).filter(m => m);

// הסתרת מודולים לפי LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const hiddenModules = splitModuleList(process.env.LOG_HIDE_MODULES);
  if (info.label && hiddenModules.includes(info.label)) {
    return false;
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES ("*" או ריק = הכל)
const filterByModuleNameFormat = winston.format((info) => {
  const allowedModules = splitModuleList(process.env.LOG_MODULES);
  if (allowedModules.length === 0 || allowedModules.includes('*')) {
    return info;
  }
  if (info.label && !allowedModules.includes(info.label)) {
    return false;
  }
  return info;
});

/**
 * פורמט למטא-דאטה של רשומת לוג, כולל טיפול בשגיאות.
 * @param metadata - שדות נוספים שהועברו ללוגר.
 * @returns מחרוזת מפורמטת (עם רווח מוביל) או מחרוזת ריקה.
 */
function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        const code = 'code' in value && value.code !== undefined ? ` (${String(value.code)})` : '';
        return `${key}=${value.name}${code}: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

const collectMetadata = (info: winston.Logform.TransformableInfo): Record<string, unknown> => {
  const {
    level: _level, message: _message, timestamp: _timestamp, label: _label,
    module: _module, environment: _environment, stack: _stack,
    ...rest
  } = info;
  return rest;
};

const renderLine = (info: winston.Logform.TransformableInfo, levelString: string): string => {
  let logMessage = `${String(info.timestamp)} [${info.environment?.toUpperCase()}] [${levelString}]`;
  if (info.module) {
    logMessage += ` (${info.module})`;
  }
  logMessage += `: ${String(info.message)}`;
  logMessage += formatLogMetadata(collectMetadata(info));
  if (typeof info.stack === 'string') {
    logMessage += `\n${info.stack}`;
  }
  return logMessage;
};

// פורמט טקסט ללא צבעים (לקובץ)
export const fileFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase()))
);

export const consoleFormat = () => winston.format.combine(
  winston.format.padLevels(),
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

/**
 * יוצר לוגר ייעודי למודול.
 * הטרנספורטים נקבעים לפי LOG_TO_CONSOLE / LOG_TO_FILE / LOG_FILE_PATH והרמה לפי LOG_LEVEL.
 * @param moduleName - שם המודול שיופיע בכל שורת לוג ובו ישתמשו מסנני המודולים.
 */
const createModuleLogger = (moduleName: string): ModuleLogger => {
  const environment = process.env.NODE_ENV || 'unknown';
  const activeTransports: winston.transport[] = [];

  if (process.env.LOG_TO_CONSOLE === 'true' || process.env.LOG_TO_CONSOLE === undefined) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (process.env.LOG_TO_FILE === 'true') {
    activeTransports.push(new winston.transports.File({
      filename: process.env.LOG_FILE_PATH || 'logs/rxv.log',
      format: fileFormat(),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
      tailable: true,
    }));
  }

  // winston מתריע כשאין טרנספורט כלל
  if (activeTransports.length === 0) {
    activeTransports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    exitOnError: false,
  }) as ModuleLogger;
};

export default createModuleLogger;

export { createModuleLogger };
