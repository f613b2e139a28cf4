import { consoleLogger, type OnsetLogger } from "./logger.ts";

export type DiagnosticHook = (error: unknown, context: Record<string, unknown>) => void;

export class DiagnosticRegistry {
  private hook: DiagnosticHook | null = null;

  constructor(private readonly fallback: OnsetLogger = consoleLogger) {}

  install(hook: DiagnosticHook): boolean {
    if (this.hook) {
      return false;
    }
    this.hook = hook;
    return true;
  }

  report(error: unknown, context: Record<string, unknown> = {}): void {
    if (this.hook) {
      this.hook(error, context);
      return;
    }
    this.fallback.error("unhandled detector failure", error, context);
  }

  get installed(): boolean {
    return this.hook !== null;
  }
}

const processRegistry = new DiagnosticRegistry();

/**
 * Installs a process-wide crash diagnostics hook. Only the first call takes
 * effect; later calls return `false` and leave the installed hook in place.
 *
 * The detector itself never reports through this hook. Hosts call
 * {@link reportDiagnostic} from their own error paths.
 */
export function installDiagnosticHook(hook: DiagnosticHook): boolean {
  return processRegistry.install(hook);
}

export function reportDiagnostic(error: unknown, context: Record<string, unknown> = {}): void {
  processRegistry.report(error, context);
}

export function hasDiagnosticHook(): boolean {
  return processRegistry.installed;
}
