export { accountSchema, type Account } from './account.js';
export {
  ServerStatus,
  serverStatusName,
  serverStatusSchema,
  serverPlayersSchema,
  serverSoftwareSchema,
  serverSchema,
  type ServerStatusName,
  type ServerPlayers,
  type ServerSoftware,
  type Server,
} from './server.js';
export { pathInfoSchema, walkPathInfo, type PathInfo, type PathInfoWire } from './path-info.js';
export {
  configOptionSchema,
  kindOf,
  toConfigValue,
  toConfigUpdate,
  type ConfigOption,
  type ConfigOptionType,
  type ConfigScalar,
  type ConfigUpdate,
  type ConfigValue,
  type ConfigValueKind,
} from './config-option.js';
export { logUploadSchema, logContentSchema, type LogUpload, type LogContent } from './log.js';
export {
  ramSettingSchema,
  motdSettingSchema,
  stringListSchema,
  type RamSetting,
  type MotdSetting,
} from './options.js';
