import { describe, it, expect, beforeEach } from 'vitest';

import { ConfigurationManager } from './configurationManager.js';

describe('ConfigurationManager', () => {
  let configManager: ConfigurationManager;

  beforeEach(() => {
    configManager = new ConfigurationManager();
  });

  it('should prefer the streaming lookup by default', () => {
    expect(configManager.isStreamingGoToImplementationEnabled('typescript')).toBe(true);
    expect(configManager.getLogLevel()).toBe('info');
  });

  it('should apply the global toggle from initialization options', () => {
    configManager.updateFromInitializationOptions({ streamingGoToImplementation: false });

    expect(configManager.isStreamingGoToImplementationEnabled('typescript')).toBe(false);
    expect(configManager.isStreamingGoToImplementationEnabled('python')).toBe(false);
  });

  it('should let a per-language entry win over the global toggle', () => {
    configManager.updateFromSettings({
      streamingGoToImplementation: false,
      streamingGoToImplementationByLanguage: { python: true }
    });

    expect(configManager.isStreamingGoToImplementationEnabled('python')).toBe(true);
    expect(configManager.isStreamingGoToImplementationEnabled('typescript')).toBe(false);
  });

  it('should read the toggle fresh after each settings change', () => {
    configManager.updateFromSettings({ streamingGoToImplementationByLanguage: { python: false } });
    expect(configManager.isStreamingGoToImplementationEnabled('python')).toBe(false);

    configManager.updateFromSettings({ streamingGoToImplementationByLanguage: { python: true } });
    expect(configManager.isStreamingGoToImplementationEnabled('python')).toBe(true);
  });

  it('should ignore values of the wrong type field by field', () => {
    configManager.updateFromSettings({
      streamingGoToImplementation: 'no',
      streamingGoToImplementationByLanguage: { go: 'yes', rust: false },
      logLevel: 'verbose'
    });

    const config = configManager.getConfig();
    expect(config.streamingGoToImplementation).toBe(true);
    expect(config.streamingGoToImplementationByLanguage).toEqual({ rust: false });
    expect(config.logLevel).toBe('info');
  });

  it('should ignore null or undefined settings', () => {
    configManager.updateFromSettings(null);
    configManager.updateFromInitializationOptions(undefined);

    expect(configManager.getConfig()).toEqual({
      streamingGoToImplementation: true,
      streamingGoToImplementationByLanguage: {},
      logLevel: 'info'
    });
  });

  it('should accept a valid log level', () => {
    configManager.updateFromSettings({ logLevel: 'debug' });

    expect(configManager.getLogLevel()).toBe('debug');
  });

  it('should hand out copies of the configuration', () => {
    const config = configManager.getConfig();
    config.streamingGoToImplementationByLanguage.typescript = false;

    expect(configManager.isStreamingGoToImplementationEnabled('typescript')).toBe(true);
  });
});
