import { logger } from '../logging/logger.js';

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: NodeJS.ProcessEnv) => boolean; message: string }
    | { type: 'assert'; check: (env: NodeJS.ProcessEnv) => boolean; message: string };

export class ConfigGuardViolation extends Error {
    constructor(public readonly violations: readonly string[]) {
        super(`Configuration guard violation: ${violations.join('; ')}`);
        this.name = 'ConfigGuardViolation';
    }
}

/**
 * Fail-closed configuration guard.
 * No defaults. No missing values. No unsafe patterns.
 */
export class ConfigGuard {
    static enforce(rules: GuardRule[], env: NodeJS.ProcessEnv = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            throw new ConfigGuardViolation(errors);
        }

        logger.info("Configuration guard passed.");
    }
}
