/**
 * Managed-service adapter types
 *
 * The controller never touches the schema registry process directly; it goes
 * through a Workload, which owns the service's files and its run state.
 */

/**
 * Well-known file locations of the managed service
 */
export interface ServicePaths {
  /** Configuration directory */
  confDir: string;
  /** Main service configuration (JSON) */
  config: string;
  /** Users and permissions file (JSON) */
  authfile: string;
  /** Unit private key for TLS */
  sslKeyfile: string;
  /** Signed unit certificate */
  sslCertfile: string;
  /** CA bundle */
  sslCafile: string;
}

/**
 * Operations the controller performs against the managed service
 *
 * Implementations signal retryable conditions (e.g. a rolling restart in
 * progress) with TransientBackendFailure.
 */
export interface Workload {
  readonly paths: ServicePaths;
  /** Service operations stop waiting, and kill what they spawned, once `signal` aborts */
  start(signal?: AbortSignal): Promise<void>;
  stop(signal?: AbortSignal): Promise<void>;
  restart(signal?: AbortSignal): Promise<void>;
  /** Read a file; undefined when it does not exist */
  read(path: string): Promise<string | undefined>;
  write(path: string, content: string, signal?: AbortSignal): Promise<void>;
  /** Remove a file; missing files are not an error */
  remove(path: string): Promise<void>;
  /** Whether the service process is running */
  active(signal?: AbortSignal): Promise<boolean>;
}

/**
 * Build the standard path layout under a configuration directory
 */
export function buildServicePaths(confDir: string): ServicePaths {
  const dir = confDir.replace(/\/+$/, '');
  return {
    confDir: dir,
    config: `${dir}/karapace.config.json`,
    authfile: `${dir}/authfile.json`,
    sslKeyfile: `${dir}/private.key`,
    sslCertfile: `${dir}/cert.pem`,
    sslCafile: `${dir}/cacert.pem`,
  };
}
