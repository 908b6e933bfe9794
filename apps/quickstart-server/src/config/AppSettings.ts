import * as fs from 'fs';
import * as path from 'path';
import { plainToInstance, Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, IsUrl, Max, Min, ValidateNested, validateSync, ValidationError } from 'class-validator';
import { OidcSettings } from '@oidc-quickstart/auth-oidc';
import { toError } from '@oidc-quickstart/core-util';

export class ServerSettings {
    @IsInt()
    @Min(0)
    @Max(65535)
    port: number = 3000;

    /**
     * Public origin; defaults to http://localhost:<port>.
     */
    @IsUrl({ require_tld: false, require_protocol: true })
    baseUrl: string = '';

    /**
     * Encrypts the session cookie.
     */
    @IsString()
    @IsNotEmpty()
    sessionSecret: string = '';
}

export class ForecastApiSettings {
    /**
     * Defaults to the server's own base URL.
     */
    @IsUrl({ require_tld: false, require_protocol: true })
    baseUrl: string = '';
}

/**
 * config/appsettings.json, after environment overrides.
 */
export class AppSettings {
    @ValidateNested()
    @Type(() => OidcSettings)
    auth: OidcSettings = new OidcSettings();

    @ValidateNested()
    @Type(() => ServerSettings)
    server: ServerSettings = new ServerSettings();

    @ValidateNested()
    @Type(() => ForecastApiSettings)
    forecastApi: ForecastApiSettings = new ForecastApiSettings();
}

export class SettingsError extends Error {
    constructor(public readonly violations: string[]) {
        super(`Invalid settings:\n  ${violations.join('\n  ')}`);
        this.name = 'SettingsError';
    }
}

export const DEFAULT_SETTINGS_FILE = path.resolve(__dirname, '../../config/appsettings.json');

type PlainSection = Record<string, unknown>;

function isSection(value: unknown): value is PlainSection {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sectionOf(raw: PlainSection, name: string): PlainSection {
    const section = raw[name];
    return isSection(section) ? { ...section } : {};
}

function override(section: PlainSection, key: string, value: string | undefined): void {
    if (value !== undefined && value !== '') {
        section[key] = value;
    }
}

/**
 * Environment variables win over the file:
 * AUTH_DOMAIN, AUTH_CLIENT_ID, AUTH_CLIENT_SECRET, AUTH_AUDIENCE,
 * SESSION_SECRET, PORT and BASE_URL.
 */
function applyEnvironment(raw: PlainSection, env: NodeJS.ProcessEnv): PlainSection {
    const auth = sectionOf(raw, 'auth');
    override(auth, 'domain', env.AUTH_DOMAIN);
    override(auth, 'clientId', env.AUTH_CLIENT_ID);
    override(auth, 'clientSecret', env.AUTH_CLIENT_SECRET);
    override(auth, 'audience', env.AUTH_AUDIENCE);

    const server = sectionOf(raw, 'server');
    override(server, 'sessionSecret', env.SESSION_SECRET);
    override(server, 'baseUrl', env.BASE_URL);
    if (env.PORT !== undefined && env.PORT !== '') {
        server.port = Number(env.PORT);
    }

    return { ...raw, auth, server, forecastApi: sectionOf(raw, 'forecastApi') };
}

function collectViolations(errors: ValidationError[], parentPath: string = ''): string[] {
    const violations: string[] = [];
    for (const error of errors) {
        const propertyPath = parentPath ? `${parentPath}.${error.property}` : error.property;
        for (const message of Object.values(error.constraints ?? {})) {
            violations.push(`${propertyPath}: ${message}`);
        }
        violations.push(...collectViolations(error.children ?? [], propertyPath));
    }
    return violations;
}

/**
 * Builds validated settings from the parsed file and the environment.
 *
 * @throws SettingsError listing every failing property path
 */
export function parseAppSettings(raw: unknown, env: NodeJS.ProcessEnv = {}): AppSettings {
    const plain = applyEnvironment(isSection(raw) ? raw : {}, env);
    const settings = plainToInstance(AppSettings, plain);

    if (!settings.server.baseUrl) {
        settings.server.baseUrl = `http://localhost:${settings.server.port}`;
    }
    settings.server.baseUrl = settings.server.baseUrl.replace(/\/+$/, '');
    if (!settings.forecastApi.baseUrl) {
        settings.forecastApi.baseUrl = settings.server.baseUrl;
    }

    const violations = collectViolations(validateSync(settings));
    if (violations.length > 0) {
        throw new SettingsError(violations);
    }
    return settings;
}

/**
 * Reads SETTINGS_FILE, or config/appsettings.json beside the sources.
 */
export function loadAppSettings(env: NodeJS.ProcessEnv = process.env): AppSettings {
    const file = env.SETTINGS_FILE || DEFAULT_SETTINGS_FILE;

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(file, 'utf8'));
    } catch (err: unknown) {
        const error = toError(err);
        throw new Error(`[AppSettings] Cannot read settings file ${file}: ${error.message}`);
    }

    const settings = parseAppSettings(raw, env);
    console.log(`[AppSettings] Loaded ${file} (domain=${settings.auth.domain}, port=${settings.server.port})`);
    return settings;
}
