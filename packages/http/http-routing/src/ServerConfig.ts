/**
 * Framework-level server settings, bound in the framework container.
 */
export class ServerConfig {
    constructor(
        public readonly port: number = 8080,
        /**
         * Externally visible origin, e.g. 'http://localhost:3000'.
         * OIDC redirect URIs are built from it.
         */
        public readonly baseUrl: string = `http://localhost:${port}`,
    ) {}
}

export const SERVER_CONFIG_TOKEN = Symbol.for('ServerConfig');
