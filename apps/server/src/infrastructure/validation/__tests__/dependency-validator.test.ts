import { DependencyValidator, type CommandLookup } from '../dependency-validator';
import { createSilentLogger } from '../../logging';

function lookupWith(installed: Record<string, string>): CommandLookup {
  return async command => {
    const path = installed[command];
    if (path === undefined) {
      throw new Error(`not found: ${command}`);
    }
    return path;
  };
}

const ALL = lookupWith({ mpv: '/usr/bin/mpv', 'yt-dlp': '/usr/local/bin/yt-dlp' });

describe('DependencyValidator', () => {
  describe('checkDependency', () => {
    it('should return the resolved path', async () => {
      await expect(DependencyValidator.checkDependency('mpv', ALL)).resolves.toEqual({ success: true, value: '/usr/bin/mpv' });
    });

    it('should report a command missing from PATH', async () => {
      await expect(DependencyValidator.checkDependency('vlc', ALL)).resolves.toEqual({
        success: false,
        error: "Command 'vlc' not found in PATH"
      });
    });
  });

  describe('checkAllDependencies', () => {
    it('should list available and missing tools', async () => {
      const result = await DependencyValidator.checkAllDependencies(lookupWith({ mpv: '/usr/bin/mpv' }));

      expect(result).toEqual({ available: { mpv: '/usr/bin/mpv' }, missing: ['yt-dlp'] });
    });
  });

  describe('validateAtStartup', () => {
    it('should succeed with every tool present', async () => {
      const result = await DependencyValidator.validateAtStartup(createSilentLogger(), ALL);

      expect(result).toEqual({ success: true, value: { mpv: '/usr/bin/mpv', ytDlp: '/usr/local/bin/yt-dlp' } });
    });

    it('should carry on without yt-dlp', async () => {
      const result = await DependencyValidator.validateAtStartup(createSilentLogger(), lookupWith({ mpv: '/usr/bin/mpv' }));

      expect(result).toEqual({ success: true, value: { mpv: '/usr/bin/mpv', ytDlp: null } });
    });

    it('should fail without mpv', async () => {
      const result = await DependencyValidator.validateAtStartup(createSilentLogger(), lookupWith({ 'yt-dlp': '/usr/local/bin/yt-dlp' }));

      expect(result).toEqual({ success: false, error: 'DEPENDENCY_MISSING' });
    });
  });

  describe('getInstallationSuggestions', () => {
    it('should suggest package manager commands', () => {
      const suggestions = DependencyValidator.getInstallationSuggestions(['yt-dlp']);

      expect(Object.keys(suggestions)).toEqual(['yt-dlp']);
      expect(suggestions['yt-dlp'][0]).toBe('pip install yt-dlp');
    });
  });
});
