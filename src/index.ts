export * from './ordering/index.js';
export * from './sort/index.js';
export {
  OrderingError,
  NoOrderingAvailableError,
  IncomparableValuesError,
  InvalidArgumentError,
  RegistryError,
  ConfigError,
  ParseError,
  exitCodeFor,
  formatError,
} from './errors/index.js';
