import type { ModerationConfig } from "../moderation/types.js";

export interface WardenConfig {
  readonly gateway: GatewayConfig;
  readonly admin: AdminConfig;
  readonly logging?: LoggingConfig;
  readonly moderation?: Partial<ModerationConfig>;
}

export interface GatewayConfig {
  readonly port: number;
  readonly hostname: string;
  readonly trustForwardedFor: boolean;
}

export interface AdminConfig {
  readonly token?: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
