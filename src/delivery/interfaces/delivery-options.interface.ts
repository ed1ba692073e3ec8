import type { AdminCredentials } from '../../lifecycle/interfaces/run-parameters.interface';

export interface DeliveryOptions {
  importCertificate: boolean;
  restartAfterImport: boolean;
  adminCredentials?: AdminCredentials;
}
