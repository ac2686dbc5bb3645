import type { GlobalConfig, UpgradeOptions } from '../control-plane/types.js';

/** Writes the reconciled options over the stored global and proxy settings. */
export function applyOptions(global: GlobalConfig, options: UpgradeOptions, cliVersion: string): GlobalConfig {
  return {
    ...global,
    namespace: options.namespace,
    version: cliVersion,
    autoInject: options.proxyAutoInject || global.autoInject,
    proxy: {
      image: options.proxy.image,
      version: options.proxy.version || cliVersion,
      logLevel: options.proxy.logLevel,
      inboundPort: options.proxy.inboundPort,
      outboundPort: options.proxy.outboundPort,
      adminPort: options.proxy.adminPort,
      ignoreInboundPorts: [...options.proxy.skipInboundPorts],
      ignoreOutboundPorts: [...options.proxy.skipOutboundPorts],
      resources: {
        cpuRequest: options.proxy.cpuRequest,
        memoryRequest: options.proxy.memoryRequest,
      },
      disableExternalProfiles: options.proxy.disableExternalProfiles,
    },
  };
}
