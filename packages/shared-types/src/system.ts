export interface LogEntry {
  time: string;
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  exception?: string;
}

export interface HealthStatus {
  status: 'ok';
  database: boolean;
  services: {
    tmdb: boolean;
    yts: boolean;
  };
}

export interface SettingsView {
  tmdb: {
    configured: boolean;
    source: 'database' | 'environment' | 'none';
  };
}
