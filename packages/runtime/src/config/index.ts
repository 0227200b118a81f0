export {
  Config,
  ConfigChangeHub,
  ConfigSection,
  defineConfigSection,
  type ConfigChangedEvent,
  type ConfigChangedHandler,
  type ConfigOptions,
  type ConfigSectionDefinition,
} from './config.js';
export {
  LocationResolver,
  ModLocation,
  defaultLocations,
  locationConfigSchema,
  locationsSection,
} from './locations.js';
