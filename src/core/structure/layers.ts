/**
 * Directory names treated as architectural layers, in reporting order.
 */
export const KNOWN_LAYERS: readonly string[] = [
  'routes', 'controllers', 'controller', 'services', 'service',
  'repositories', 'repository', 'models', 'model', 'middleware',
  'utils', 'util', 'lib', 'helpers', 'types', 'handlers', 'resolvers',
  'stores', 'hooks', 'components', 'pages', 'app', 'api', 'db',
  'database', 'config', 'auth', 'tests', 'test', '__tests__',
  'entity', 'entities', 'dto', 'converter', 'mapper', 'filter',
  'interceptor', 'domain', 'infrastructure', 'adapter', 'port',
  'presenter', 'exception', 'exceptions',
];
