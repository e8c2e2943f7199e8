export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
}
