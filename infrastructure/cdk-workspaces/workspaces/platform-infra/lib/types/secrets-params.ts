/**
 * Secrets Manager Parameters
 */
export interface SecretsParams {
  /**
   * Rotate the RDS credentials secret with the hosted MySQL single-user rotation
   */
  readonly enableRotation: boolean;
  readonly rotationDays: number;
}
