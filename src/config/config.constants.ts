// Configuration defaults
export const DEFAULT_CERTBOT_DIR = '/opt/FileMaker/FileMaker Server/CStore/Certbot';
export const DEFAULT_CREDENTIALS_DIR = '/etc/certbot';
export const DEFAULT_CERTBOT_COMMAND = 'certbot';
export const DEFAULT_ADMIN_COMMAND = 'fmsadmin';
export const DEFAULT_SERVICE_CONTROL_COMMAND = 'systemctl';
export const DEFAULT_SERVICE_NAME = 'fmshelper';
export const DEFAULT_SERVICE_USER = 'fmserver';
export const DEFAULT_SERVICE_GROUP = 'fmsadmin';
export const DEFAULT_RESTART_GRACE_MS = 10_000;

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
