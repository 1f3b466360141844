/**
 * Domain Error Classes
 *
 * Thrown by pure domain code for programming errors (bad arguments).
 * Request-level failures live in the server's error module.
 */

/**
 * Invalid argument - a caller handed the domain layer something it cannot use,
 * such as an absent movement or a non-positive quantity.
 *
 * @example
 * throw new InvalidArgumentError('movement is required', 'movement');
 */
export class InvalidArgumentError extends Error {
    readonly name = 'InvalidArgumentError' as const;
    readonly argument: string | null;

    constructor(message: string, argument: string | null = null) {
        super(message);
        this.argument = argument;
        Object.setPrototypeOf(this, InvalidArgumentError.prototype);
    }
}
