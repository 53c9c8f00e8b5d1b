export interface IBackendClient {
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
