/**
 * Dependency validation for external executables
 *
 * mpv is required. yt-dlp only backs the last-resort extraction strategy,
 * so its absence disables that strategy instead of stopping the service.
 */

import which from 'which';
import type { Logger } from 'pino';
import type { Result } from '@stream-keeper/shared';
import { PlaybackErrorFactory, type ProcessError } from '../../domain/playback';

export type ExternalTool = 'mpv' | 'yt-dlp';

export type CommandLookup = (command: string) => Promise<string>;

/**
 * Resolved executable paths. A missing optional tool is null.
 */
export interface ExternalDependencies {
  mpv: string;
  ytDlp: string | null;
}

export interface DependencyValidationResult {
  available: Partial<Record<ExternalTool, string>>;
  missing: ExternalTool[];
}

interface ToolSpec {
  readonly purpose: string;
  readonly required: boolean;
  readonly install: readonly string[];
}

const TOOLS: Record<ExternalTool, ToolSpec> = {
  mpv: {
    purpose: 'video playback',
    required: true,
    install: [
      'apt-get install mpv  # Ubuntu/Debian',
      'dnf install mpv      # Fedora',
      'brew install mpv     # macOS',
      'pacman -S mpv        # Arch Linux'
    ]
  },
  'yt-dlp': {
    purpose: 'last-resort stream extraction',
    required: false,
    install: ['pip install yt-dlp', 'pipx install yt-dlp', 'brew install yt-dlp     # macOS']
  }
};

const defaultLookup: CommandLookup = command => which(command);

export class DependencyValidator {
  /**
   * Path of a command on PATH
   */
  static async checkDependency(command: string, lookup: CommandLookup = defaultLookup): Promise<Result<string, string>> {
    try {
      return { success: true, value: await lookup(command) };
    } catch {
      return { success: false, error: `Command '${command}' not found in PATH` };
    }
  }

  static async checkAllDependencies(lookup: CommandLookup = defaultLookup): Promise<DependencyValidationResult> {
    const tools: ExternalTool[] = ['mpv', 'yt-dlp'];
    const results = await Promise.all(tools.map(tool => this.checkDependency(tool, lookup)));

    const available: Partial<Record<ExternalTool, string>> = {};
    const missing: ExternalTool[] = [];
    results.forEach((result, index) => {
      if (result.success) {
        available[tools[index]] = result.value;
      } else {
        missing.push(tools[index]);
      }
    });

    return { available, missing };
  }

  static getInstallationSuggestions(missing: readonly ExternalTool[]): Record<string, string[]> {
    const suggestions: Record<string, string[]> = {};
    for (const tool of missing) {
      suggestions[tool] = [...TOOLS[tool].install];
    }
    return suggestions;
  }

  /**
   * Check the tools once at startup and log what is missing with install hints
   */
  static async validateAtStartup(logger: Logger, lookup: CommandLookup = defaultLookup): Promise<Result<ExternalDependencies, ProcessError>> {
    const log = logger.child({ component: 'DependencyValidator' });
    const { available, missing } = await this.checkAllDependencies(lookup);
    const suggestions = this.getInstallationSuggestions(missing);

    for (const tool of missing) {
      const spec = TOOLS[tool];
      if (spec.required) {
        log.error({ tool, install: suggestions[tool] }, `${tool} is required for ${spec.purpose}`);
      } else {
        log.warn({ tool, install: suggestions[tool] }, `${tool} not found; ${spec.purpose} is disabled`);
      }
    }

    const mpv = available.mpv;
    if (!mpv) {
      const details = PlaybackErrorFactory.createProcessError('DEPENDENCY_MISSING', { missing });
      log.error({ code: details.code }, details.message);
      return { success: false, error: 'DEPENDENCY_MISSING' };
    }

    log.info({ mpv, ytDlp: available['yt-dlp'] ?? null }, 'External dependencies checked');
    return { success: true, value: { mpv, ytDlp: available['yt-dlp'] ?? null } };
  }
}
