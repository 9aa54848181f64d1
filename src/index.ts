export {
	configure,
	ConfigurationError,
	getConfig,
	loadConfig,
	resetConfig,
	LOG_LEVELS,
} from './config.js';
export type { LogLevel, ScopewireConfig } from './config.js';
export { Container, isDisposable } from './container.js';
export type { ContainerOptions, IContainer, IDisposable } from './container.js';
export {
	AmbiguousScopeError,
	BaseError,
	CircularDependencyError,
	ContainerDisposedError,
	ContainerError,
	DependencyCreationError,
	DisposalError,
	DuplicateRegistrationError,
	InvalidArgumentError,
	NotRegisteredError,
	OutOfOrderScopeDisposeError,
	TypeMismatchError,
} from './errors.js';
export type { ErrorDump, ErrorProps } from './errors.js';
export { createContainer } from './factory.js';
export type { CreateContainerOptions } from './factory.js';
export { createConsoleLogger, getLogger, setLogger } from './logger.js';
export type { LogFn, Logger, LogObject } from './logger.js';
export { Registration } from './registration.js';
export type { Factory, Lifetime, ResolutionContext } from './registration.js';
export {
	ContainerRegistration,
	ContainerRegistry,
	registry,
} from './registry.js';
export type { ContainerScope } from './registry.js';
export { ScopeController, ScopeHandle } from './scope.js';
export type { ScopeFrame, ScopeTarget } from './scope.js';
export { Tag } from './tag.js';
export type { AnyTag, ServiceTag, TagId, TagType, ValueTag } from './tag.js';
