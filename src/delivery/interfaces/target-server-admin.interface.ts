import type { Outcome } from '../../shared/outcome';
import type { AdminCredentials } from '../../lifecycle/interfaces/run-parameters.interface';

/**
 * The application server that serves the certificate.
 */
export interface TargetServerAdmin {
  /** Checks the admin tool, and the service manager when a restart will be needed. */
  verifyPrerequisites(restart: boolean): Promise<Outcome>;
  importCertificate(certificatePath: string, privateKeyPath: string, credentials: AdminCredentials): Promise<Outcome>;
  stopService(): Promise<Outcome>;
  startService(): Promise<Outcome>;
}
