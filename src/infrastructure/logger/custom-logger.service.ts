import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';

export interface LogMetadata {
  [key: string]: unknown;
}

interface FormattedLog {
  message: string;
  context?: string;
  stack?: string;
}

/**
 * ConsoleLogger that accepts a metadata object as first optional param.
 * Metadata is appended as JSON, prefixed with the calling method name.
 */
@Injectable()
export class LoggerService extends ConsoleLogger {
  constructor(context: string = '', logLevels?: LogLevel[]) {
    super(context, { logLevels });
  }

  log(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.log(formatted.message, formatted.context);
    } else {
      super.log(formatted.message);
    }
  }

  error(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.stack) {
      super.error(formatted.message, formatted.stack, formatted.context);
    } else if (formatted.context) {
      super.error(formatted.message, formatted.context);
    } else {
      super.error(formatted.message);
    }
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.warn(formatted.message, formatted.context);
    } else {
      super.warn(formatted.message);
    }
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.debug(formatted.message, formatted.context);
    } else {
      super.debug(formatted.message);
    }
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    const formatted = this.formatWithMethod(message, optionalParams);
    if (formatted.context) {
      super.verbose(formatted.message, formatted.context);
    } else {
      super.verbose(formatted.message);
    }
  }

  /** Exposed for tests: the text that would be printed for these arguments. */
  formatWithMethod(message: string, optionalParams: unknown[]): FormattedLog {
    const [first, second, third] = optionalParams;

    if (isMetadata(first)) {
      const parts: string[] = [];

      // Method name only for custom logs (with metadata)
      const methodName = this.getCallerMethodName();
      if (methodName) {
        parts.push(`[${methodName}]`);
      }

      parts.push(String(message));

      if (Object.keys(first).length > 0) {
        parts.push(JSON.stringify(first));
      }
      return {
        message: parts.join(' '),
        context: asString(second),
        stack: asString(third),
      };
    }

    // NestJS internal logs pass (context) or (stack, context)
    return {
      message: String(message),
      context: asString(first),
      stack: asString(second),
    };
  }

  private getCallerMethodName(): string {
    const stack = new Error().stack;
    if (!stack) return '';

    for (const line of stack.split('\n')) {
      // Skip logger frames
      if (line.includes('Logger')) {
        continue;
      }

      // "    at ClassName.methodName (/path/to/file.ts:line:column)"
      const match = line.match(/at\s+(?:(\w+)\.)?(\w+)\s+\(/);
      if (match) {
        return match[2];
      }
    }

    return '';
  }
}

function isMetadata(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
