export const UUID_OPTIONS = 'UUID_OPTIONS';

export interface UuidModuleOptions {
  /** Default namespace for uuid3 / uuid5 models. Falls back to UUID_NAMESPACE, then the RFC 4122 URL namespace. */
  namespace?: string;
}

export interface UuidOptions {
  namespace: string;
}
