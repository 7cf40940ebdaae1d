// Config module exports

export {
  TermscrollConfig,
  getConfigFilePath,
  type ConfigInitOptions,
  type ConfigSchema,
  type ConfigSource,
  type GuideStyleSetting,
  type ScrollbarPolicySetting,
  type UnicodeSetting,
} from './config.ts';
