/**
 * Configuration types for the Gemini client.
 */

import { z } from 'zod';
import { GeminiError } from '../errors';

/** Default Gemini port. */
export const DEFAULT_PORT = 1965;

/** Default timeout for connections (TCP + TLS handshake) in milliseconds. */
export const DEFAULT_CONNECT_TIMEOUT = 15000;

/** Default timeout for receiving the status line in milliseconds. */
export const DEFAULT_READ_TIMEOUT = 30000;

/** Default number of redirects followed before giving up. */
export const DEFAULT_MAX_REDIRECTS = 5;

/**
 * Minimum TLS version.
 */
export enum TlsVersion {
  /** TLS 1.2 (default). */
  Tls12 = 'TLSv1.2',
  /** TLS 1.3. */
  Tls13 = 'TLSv1.3',
}

/**
 * TLS configuration. TLS itself cannot be turned off.
 */
export interface TlsConfig {
  /** Minimum TLS version. */
  minVersion: TlsVersion;
  /** Verify the server certificate against the system CA store. */
  verifyCertificate: boolean;
  /** Server Name Indication override. */
  sniOverride?: string;
}

/**
 * Default TLS configuration. Gemini capsules mostly use self-signed
 * certificates, so chain verification is opt-in.
 */
export const DEFAULT_TLS_CONFIG: TlsConfig = {
  minVersion: TlsVersion.Tls12,
  verifyCertificate: false,
};

/**
 * Which responses are recorded in the navigation history.
 */
export enum HistoryPolicy {
  /** Every response outside the 3x range (prompts and errors included). */
  NonRedirect = 'non_redirect',
  /** Only successfully rendered 2x responses. */
  RenderedOnly = 'rendered_only',
}

/**
 * Gemini client configuration.
 */
export interface GeminiConfig {
  /** Connect timeout in milliseconds (0 disables). */
  connectTimeout: number;
  /** Status line timeout in milliseconds (0 disables). */
  readTimeout: number;
  /** Maximum redirects followed for one navigation. */
  maxRedirects: number;
  /** TLS configuration. */
  tls: TlsConfig;
  /** History recording policy. */
  historyPolicy: HistoryPolicy;
}

/**
 * Options for creating GeminiConfig.
 */
export interface GeminiConfigOptions {
  connectTimeout?: number;
  readTimeout?: number;
  maxRedirects?: number;
  tls?: Partial<TlsConfig>;
  historyPolicy?: HistoryPolicy;
}

const tlsConfigSchema = z.object({
  minVersion: z.nativeEnum(TlsVersion),
  verifyCertificate: z.boolean(),
  sniOverride: z.string().min(1).optional(),
});

const geminiConfigSchema = z.object({
  connectTimeout: z.number().int().min(0),
  readTimeout: z.number().int().min(0),
  maxRedirects: z.number().int().min(0).max(100),
  tls: tlsConfigSchema,
  historyPolicy: z.nativeEnum(HistoryPolicy),
});

/**
 * Creates a Gemini configuration from options.
 */
export function createGeminiConfig(options: GeminiConfigOptions = {}): GeminiConfig {
  const config: GeminiConfig = {
    connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
    readTimeout: options.readTimeout ?? DEFAULT_READ_TIMEOUT,
    maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    tls: { ...DEFAULT_TLS_CONFIG, ...options.tls },
    historyPolicy: options.historyPolicy ?? HistoryPolicy.NonRedirect,
  };

  validateConfig(config);
  return config;
}

/**
 * Validates the Gemini configuration.
 */
export function validateConfig(config: GeminiConfig): void {
  const result = geminiConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw GeminiError.configuration(`Invalid configuration: ${issues}`);
  }
}

/**
 * Builder for Gemini configuration.
 */
export class GeminiConfigBuilder {
  private options: GeminiConfigOptions = {};

  /** Sets connect timeout. */
  connectTimeout(ms: number): this {
    this.options.connectTimeout = ms;
    return this;
  }

  /** Sets status line timeout. */
  readTimeout(ms: number): this {
    this.options.readTimeout = ms;
    return this;
  }

  /** Sets the redirect limit. */
  maxRedirects(count: number): this {
    this.options.maxRedirects = count;
    return this;
  }

  /** Sets the TLS configuration. */
  tls(config: Partial<TlsConfig>): this {
    this.options.tls = { ...this.options.tls, ...config };
    return this;
  }

  /** Enables certificate chain verification. */
  verifyCertificates(): this {
    return this.tls({ verifyCertificate: true });
  }

  /** Sets the history policy. */
  historyPolicy(policy: HistoryPolicy): this {
    this.options.historyPolicy = policy;
    return this;
  }

  /** Returns the options collected so far. */
  toOptions(): GeminiConfigOptions {
    return { ...this.options, tls: this.options.tls ? { ...this.options.tls } : undefined };
  }

  /** Builds the configuration. */
  build(): GeminiConfig {
    return createGeminiConfig(this.options);
  }
}
