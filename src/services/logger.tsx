import React from 'react';
import { createApp } from '../view/App';
import type { AppProps } from '../view/App';
import type { InkInstance, InkModule } from '../view/inkTypes';

/**
 * Supported log severities understood by the {@link LoggerService}.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Describes a single log line rendered in the dashboard.
 */
export interface LogEntry {
  id: number;
  message: string;
  level: LogLevel;
  timestamp: string;
}

/**
 * Tracks the fetch currently in flight, rendered at the top of the dashboard.
 */
export interface GlobalProgressState {
  label?: string;
  current: number;
  total?: number;
}

/**
 * Aggregated UI state consumed by the Ink renderer.
 */
export interface LoggerState {
  globalLogs: LogEntry[];
  globalProgress?: GlobalProgressState;
  pagesFetched: number;
  recordsFetched: number;
}

/**
 * Optional configuration applied when instantiating {@link LoggerService}.
 *
 * @property enableInk - Overrides Ink usage detection; defaults to stderr TTY capability.
 * @property header - Custom header text rendered above the log stream.
 * @property debug - Emits `debug` entries; they are dropped otherwise.
 */
export interface LoggerOptions {
  enableInk?: boolean;
  header?: string;
  debug?: boolean;
}

/**
 * Centralised logging and progress manager. All output goes to stderr so that stdout carries
 * nothing but the rendered result. It draws an Ink dashboard when stderr is a terminal and falls
 * back to plain console lines otherwise.
 */
export class LoggerService {
  private state: LoggerState = {
    globalLogs: [],
    pagesFetched: 0,
    recordsFetched: 0,
  };

  private renderer?: InkInstance;
  private readonly useInk: boolean;
  private readonly header?: string;
  private debugEnabled: boolean;
  private logSequence = 0;
  private appComponent?: React.FC<AppProps>;
  private inkModule?: InkModule;
  private inkModulePromise?: Promise<InkModule>;

  /**
   * @param options - Optional overrides controlling renderer behaviour.
   */
  constructor(options: LoggerOptions = {}) {
    this.header = options.header;
    this.useInk = options.enableInk ?? Boolean(process.stderr.isTTY);
    this.debugEnabled = Boolean(options.debug);
  }

  /**
   * Activates the Ink renderer when supported. Safe to call multiple times.
   */
  async start(): Promise<void> {
    if (!this.useInk) {
      return;
    }

    const ink = await this.loadInk();
    const AppComponent = this.ensureAppComponent(ink);

    if (this.renderer) {
      this.renderer.rerender(<AppComponent header={this.header} state={this.state} />);
      return;
    }

    this.renderer = ink.render(<AppComponent header={this.header} state={this.state} />, {
      stdout: process.stderr,
      patchConsole: false,
    });
  }

  /**
   * Gracefully stops the Ink renderer and clears internal handles.
   */
  stop(): void {
    if (!this.renderer) {
      return;
    }

    this.renderer.unmount();
    this.renderer = undefined;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  get isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    this.appendGlobalLog('debug', message);
  }

  info(message: string): void {
    this.appendGlobalLog('info', message);
  }

  warn(message: string): void {
    this.appendGlobalLog('warn', message);
  }

  error(message: string): void {
    this.appendGlobalLog('error', message);
  }

  /**
   * Records a fetched page and moves the progress indicator.
   *
   * @param label - What is being fetched, e.g. `Fetching groups`.
   * @param page - Page number just received.
   * @param recordsSoFar - Running total of records collected by the current fetch.
   * @param limit - Requested record limit, when there is one.
   */
  recordPage(label: string, page: number, recordsSoFar: number, limit?: number): void {
    this.updateState(state => ({
      ...state,
      pagesFetched: state.pagesFetched + 1,
      recordsFetched: recordsSoFar,
      globalProgress: { label, current: recordsSoFar, total: limit },
    }));

    if (!this.useInk) {
      const suffix = limit && limit > 0 ? `${recordsSoFar}/${limit}` : `${recordsSoFar}`;
      this.debug(`${label}: page ${page}, ${suffix} records`);
    }
  }

  /**
   * Clears the global progress indicator, typically once the operation finishes.
   */
  clearGlobalProgress(): void {
    this.updateState(state => ({
      ...state,
      globalProgress: undefined,
    }));
  }

  private appendGlobalLog(level: LogLevel, message: string): void {
    this.updateState(state => ({
      ...state,
      globalLogs: [...state.globalLogs, this.createLogEntry(level, message)],
    }));

    if (!this.useInk) {
      this.logToConsole(level, message);
    }
  }

  private updateState(mutator: (state: LoggerState) => LoggerState): void {
    this.state = mutator(this.state);
    if (this.useInk && this.renderer && this.appComponent) {
      const AppComponent = this.appComponent;
      this.renderer.rerender(<AppComponent header={this.header} state={this.state} />);
    }
  }

  private createLogEntry(level: LogLevel, message: string): LogEntry {
    this.logSequence += 1;
    return {
      id: this.logSequence,
      level,
      message,
      timestamp: new Date().toISOString(),
    };
  }

  private async loadInk(): Promise<InkModule> {
    if (this.inkModule) {
      return this.inkModule;
    }

    if (!this.inkModulePromise) {
      this.inkModulePromise = (async () => {
        // ink ships as ESM only; a CommonJS build must reach it through a real dynamic import
        const module = (await new Function('return import("ink")')()) as InkModule;
        this.inkModule = module;
        return module;
      })();
    }

    return this.inkModulePromise;
  }

  private ensureAppComponent(ink: InkModule): React.FC<AppProps> {
    if (!this.appComponent) {
      this.appComponent = createApp(ink);
    }

    return this.appComponent;
  }

  private logToConsole(level: LogLevel, message: string): void {
    if (level === 'warn') {
      console.warn(message);
    } else {
      console.error(message);
    }
  }
}

export default LoggerService;
