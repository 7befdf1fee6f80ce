export {
  createModuleProbe,
  probeCapabilities,
  remediationHint,
} from './probe.js';
export type {
  CapabilityProbe,
  CapabilityStatus,
  DisabledPluginMarker,
  ProbeOptions,
} from './probe.js';

export { requires, createDisabledPlugin, isDisabledPlugin } from './requires.js';
export type { DisabledPlugin, RequiresOptions, NamedPlugin } from './requires.js';
