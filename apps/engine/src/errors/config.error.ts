export class ConfigError extends Error {
    constructor(
        public readonly variable: string,
        public readonly value: string,
        expected: string,
    ) {
        super(`${variable} must be ${expected}, got "${value}"`);
        this.name = 'ConfigError';
    }
}
