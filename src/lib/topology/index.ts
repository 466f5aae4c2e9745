export {
  interpolate,
  type InterpolationResult,
  type VariableLookup,
} from './interpolation';
export {
  parseTCPTarget,
  serviceSchema,
  topologySchema,
  type ServiceDocument,
  type TopologyDocument,
} from './schema';
export {
  TOPOLOGY_FILE_NAMES,
  findTopologyFile,
  loadTopologyFile,
  readTopologyFile,
  resolveProjectName,
  resolveServices,
  sanitizeProjectName,
  type LoadTopologyOptions,
  type Topology,
} from './topology-file';
