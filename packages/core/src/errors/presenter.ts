/**
 * ErrorPresenter - pure presentation layer for HarnessError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  HarnessError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  option?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: HarnessError): CLIErrorView {
    const colors = this.#shouldUseColors(this.options.colors);
    const terminalWidth = this.#getTerminalWidth(this.options.terminalWidth);

    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      path: error.context?.path,
      option: error.context?.option,
      workaround: this.#formatWorkaround(error),
      cause: error.cause?.message,
      colors,
      terminalWidth,
    };
  }

  formatForProduction(error: HarnessError): SerializedError {
    return error.toJSON('prod');
  }

  // Helpers
  #formatTitle(error: HarnessError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.path) return `Input: ${ctx.path}`;
    if (ctx.option) return `Option: ${ctx.option}`;
    return undefined;
  }

  #formatWorkaround(error: HarnessError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}
