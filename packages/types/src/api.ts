// Error body returned by the data service for any non-2xx response
export interface ApiErrorBody {
  error: string;
  details?: ApiErrorDetail[];
}

export interface ApiErrorDetail {
  path: string;
  message: string;
}

export interface ApiInfo {
  name: string;
  version: string;
  status: 'operational';
  timestamp: string;
}

export interface HealthStatus {
  status: 'ok';
  uptime: number;
  catalog: {
    asOf: string;
    stocks: number;
    startups: number;
  };
}
