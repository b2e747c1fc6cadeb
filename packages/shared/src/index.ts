export type EnvKey =
  | 'MYSQL_HOST'
  | 'MYSQL_PORT'
  | 'MYSQL_DATABASE'
  | 'MYSQL_USER'
  | 'MYSQL_PASSWORD'
  | 'MYSQL_ROOT_PASSWORD'
  | 'FLASK_HOST'
  | 'FLASK_PORT'
  | 'WORKERS'
  | 'ASYNC_WORKERS'
  | 'GUNICORN_TIMEOUT'
  | 'SSL_CERT_PATH'
  | 'SSL_KEY_PATH'
  | 'SSL_DOMAIN'
  | 'BOT_TOKEN'
  | 'ADMIN_IDS'
  | 'PUBLIC_BASE_URL'
  | 'USAGE_SYNC_INTERVAL'
  | 'IMAGE';

export type RuntimeKind = 'docker' | 'podman';

export type ComposeFlavor = 'native' | 'legacy';

export interface ComposeFrontEnd {
  runtime: RuntimeKind;
  flavor: ComposeFlavor;
  /** Argument vector prefix, e.g. `['docker', 'compose']` or `['podman-compose']`. */
  command: string[];
}

export interface CertificateBundle {
  domain: string;
  certPath: string;
  keyPath: string;
}

export type OsFamily = 'debian' | 'rhel' | 'unknown';

export type NetworkBackend = 'netavark' | 'cni';

/** `app` runs the web server; anything else names a worker module. */
export type ServiceRole = 'app' | (string & {});

export interface ServerCommand {
  command: string;
  args: string[];
}
