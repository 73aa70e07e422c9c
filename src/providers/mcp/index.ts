export {
  connectRemoteServer,
  type DiscoveryServer,
  type RemoteClientFactory,
  type RemoteToolClient,
  type RemoteToolInfo
} from './client';
export {
  createProxyDescriptor,
  type DiscoveryOptions,
  type DiscoveryReport,
  type DiscoveryResult,
  discoverRemoteTools,
  toArgumentSchema
} from './discovery';
