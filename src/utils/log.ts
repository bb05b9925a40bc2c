import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.LOG]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

type ExtraInformation = Record<string, unknown>;

/**
 * Extracts caller information from the call stack
 * @param depth How deep in the call stack to look (2 = caller of caller)
 */
function getCallerInfo(depth: number = 2): { fileName: string; functionName: string } {
  const originalPrepareStackTrace = Error.prepareStackTrace;

  try {
    let callSites: NodeJS.CallSite[] = [];
    Error.prepareStackTrace = (_, stack) => {
      callSites = stack;
      return '';
    };
    // Reading the stack runs prepareStackTrace, which captures the call sites
    void new Error().stack;

    if (callSites.length > depth) {
      const caller = callSites[depth];
      const fileName = caller.getFileName();
      const functionName = caller.getFunctionName();

      return {
        fileName: fileName ? path.basename(fileName, '.ts') : 'unknown',
        functionName: functionName || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = originalPrepareStackTrace;
  }

  return {
    fileName: 'unknown',
    functionName: 'unknown',
  };
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' | ');
}

/**
 * The minimum level that is written, taken from LOG_LEVEL (defaults to LOG)
 */
export function getLogThreshold(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toUpperCase();
  switch (configured) {
    case LogLevel.DEBUG:
      return LogLevel.DEBUG;
    case LogLevel.WARN:
      return LogLevel.WARN;
    case LogLevel.ERROR:
      return LogLevel.ERROR;
    default:
      return LogLevel.LOG;
  }
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts and optional extraInformation
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogThreshold()]) {
    return;
  }

  const { fileName, functionName } = getCallerInfo(3); // 3 because we go through helper methods

  let extraInformation: ExtraInformation | undefined;
  let messageParts = args;

  if (args.length > 1) {
    const lastArg = args[args.length - 1];
    if (isExtraInformation(lastArg)) {
      extraInformation = lastArg;
      messageParts = args.slice(0, -1);
    }
  }

  // Join message parts like console.log does
  const message = messageParts
    .map((part) => {
      if (typeof part === 'string') {
        return part;
      }
      if (part instanceof Error) {
        return part.stack || part.message;
      }
      return JSON.stringify(part);
    })
    .join(' ');

  const parts: string[] = [level, `${fileName}:${functionName}`, message];

  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }

  const fullOutput = parts.join(' | ');

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Adjusted balance', { categoryId: 12 })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'User', email, 'created', { userId: 4 })
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}
