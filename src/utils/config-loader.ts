/**
 * Configuration Loader
 * Reads process configuration from the environment (optionally seeded from a .env file)
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { AzureDevOpsConfig, ProxyConfig } from '../types/index.js';

export const DEFAULT_AZURE_DEVOPS_URL = 'https://dev.azure.com';
export const DEFAULT_PORT = 8001;
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_TIMEOUT_MS = 15000;

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvironmentSchema = z.object({
  AZURE_ORG: optionalString,
  AZURE_PROJECT: optionalString,
  AZURE_TEAM: optionalString,
  AZURE_DEVOPS_URL: optionalString,
  AZURE_REQUEST_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().optional()),
  HOST: optionalString,
  PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).optional()),
  DEBUG: optionalString,
});

export type Environment = Record<string, string | undefined>;

export class ConfigLoader {
  /**
   * Build the immutable process configuration.
   * Missing organization or project leaves `azure` null; malformed values throw.
   */
  static loadConfig(env: Environment = process.env): ProxyConfig {
    const parsed = EnvironmentSchema.safeParse(env);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }

    const values = parsed.data;
    const baseUrl = values.AZURE_DEVOPS_URL ?? DEFAULT_AZURE_DEVOPS_URL;
    this.validateOrganizationUrl(baseUrl);

    let azure: AzureDevOpsConfig | null = null;
    if (values.AZURE_ORG && values.AZURE_PROJECT) {
      azure = Object.freeze({
        organization: values.AZURE_ORG,
        project: values.AZURE_PROJECT,
        team: values.AZURE_TEAM ?? values.AZURE_PROJECT,
        organizationUrl: this.buildOrganizationUrl(baseUrl, values.AZURE_ORG),
        timeoutMs: values.AZURE_REQUEST_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
      });
    } else {
      const missing = [
        values.AZURE_ORG ? null : 'AZURE_ORG',
        values.AZURE_PROJECT ? null : 'AZURE_PROJECT',
      ].filter((name): name is string => name !== null);
      console.error(`[WARNING] Azure DevOps configuration incomplete, missing: ${missing.join(', ')}`);
    }

    return Object.freeze({
      server: Object.freeze({
        host: values.HOST ?? DEFAULT_HOST,
        port: values.PORT ?? DEFAULT_PORT,
      }),
      azure,
      debug: values.DEBUG === 'true',
    });
  }

  /**
   * Check if hostname is a valid Azure DevOps domain
   */
  static isValidAzureDevOpsHostname(hostname: string): boolean {
    return hostname === 'dev.azure.com' ||
           hostname.endsWith('.visualstudio.com') ||
           hostname.endsWith('.dev.azure.com');
  }

  /**
   * Validate that the Azure DevOps URL uses HTTPS and points to a recognized Azure DevOps domain.
   * PATs are only ever sent to hosts that pass this check.
   */
  static validateOrganizationUrl(organizationUrl: string): void {
    let parsed: URL;
    try {
      parsed = new URL(organizationUrl);
    } catch {
      throw new ConfigurationError(`Invalid Azure DevOps URL: '${organizationUrl}' is not a valid URL`);
    }

    if (parsed.protocol !== 'https:') {
      throw new ConfigurationError(
        `Azure DevOps URL must use HTTPS (got '${parsed.protocol}'). ` +
        `PAT tokens must not be transmitted over unencrypted connections.`
      );
    }

    if (!this.isValidAzureDevOpsHostname(parsed.hostname)) {
      throw new ConfigurationError(
        `Azure DevOps URL hostname '${parsed.hostname}' is not a recognized Azure DevOps domain. ` +
        `Expected: dev.azure.com, *.visualstudio.com, or *.dev.azure.com.`
      );
    }
  }

  /**
   * dev.azure.com carries the organization in the path; legacy
   * {org}.visualstudio.com hosts already name it.
   */
  static buildOrganizationUrl(baseUrl: string, organization: string): string {
    const trimmed = baseUrl.replace(/\/+$/, '');
    if (new URL(trimmed).hostname.endsWith('.visualstudio.com')) {
      return trimmed;
    }
    return `${trimmed}/${encodeURIComponent(organization)}`;
  }
}
