/**
 * Response for GET /health.
 */
export interface HealthResponse {
  status: 'ok';
}
