/**
 * Validated email address, usable as a Basic username
 *
 * @module email
 */

// biome-ignore lint/correctness/useImportExtensions: workspace package import
import { CredentialValidationError, ValidationFailure } from "@keyway/core";
import { z } from "zod";

/**
 * Email address schema (surrounding whitespace is trimmed)
 */
export const EmailAddressSchema = z.string().trim().email();

export class EmailAddress {
    /** Canonical textual form */
    readonly value: string;

    private constructor(value: string) {
        this.value = value;
    }

    /**
     * @throws CredentialValidationError (invalidEmailAddress)
     */
    static parse(input: string): EmailAddress {
        const result = EmailAddressSchema.safeParse(input);
        if (!result.success) {
            throw new CredentialValidationError(ValidationFailure.INVALID_EMAIL_ADDRESS, `Invalid email address: ${input}`);
        }
        return new EmailAddress(result.data);
    }

    equals(other: EmailAddress): boolean {
        return this.value === other.value;
    }

    toString(): string {
        return this.value;
    }
}
