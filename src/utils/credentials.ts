/**
 * ================================================================================
 * CREDENTIAL FILES - Reading Key Material for the Authenticate Stage
 * ================================================================================
 *
 * Reads and shape-checks the credential file a release authenticates with.
 * Nothing here talks to a cloud; the platforms exchange the parsed key for a
 * session. Every failure is an AuthError so the run stops at authenticate.
 *
 * SUPPORTED FILES:
 * • GCP service account key (JSON, "type": "service_account")
 * • AWS access key (JSON with accessKeyId / secretAccessKey)
 * • Either of the above, password-encrypted: {"salt", "nonce", "tag", "ciphertext"}
 *   (base64, AES-256-GCM, key from PBKDF2-SHA256 with 480000 iterations)
 *
 * PASSWORD:
 * • CREDENTIALS_PASSWORD env var, or an interactive prompt before the run starts
 *
 * //! SECURITY: key material is never logged; only the principal is
 */

import { createDecipheriv, pbkdf2 } from 'crypto';
import { promises as fs } from 'fs';
import { promisify } from 'util';
import inquirer from 'inquirer';
import { AuthError, describeError } from './errors';

export const CREDENTIALS_PASSWORD_ENV = 'CREDENTIALS_PASSWORD';

const PBKDF2_ITERATIONS = 480_000;
const KEY_LENGTH = 32;

const derivePbkdf2Key = promisify(pbkdf2);

/** Supplies the password of an encrypted credential file */
export type PasswordSource = (file: string) => Promise<string>;

export interface ServiceAccountKey {
    clientEmail: string;
    projectId?: string;
    /** Plaintext key JSON, set only when the file on disk was encrypted */
    decryptedKey?: string;
}

export interface AwsAccessKey {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
}

interface CredentialContent {
    record: Record<string, unknown>;
    json: string;
    encrypted: boolean;
}

export const passwordFromEnv: PasswordSource = async (file) => {
    const password = process.env[CREDENTIALS_PASSWORD_ENV];
    if (!password) {
        throw new AuthError(
            `Credential file ${file} is encrypted; set ${CREDENTIALS_PASSWORD_ENV} or run interactively to enter its password`
        );
    }
    return password;
};

/**
 * Ask for the password on the terminal
 */
export async function promptForCredentialPassword(file: string): Promise<string> {
    const { password } = await inquirer.prompt<{ password: string }>([
        {
            type: 'password',
            name: 'password',
            mask: '*',
            message: `Password for ${file}:`,
            validate: (input: string) => input.length > 0 || 'Password cannot be empty'
        }
    ]);
    return password;
}

async function readText(file: string): Promise<string> {
    try {
        return await fs.readFile(file, 'utf-8');
    } catch (error) {
        throw new AuthError(`Credential file not found or unreadable: ${file}`, { cause: error });
    }
}

function parseCredentialJson(content: string, file: string): Record<string, unknown> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new AuthError(`Credential file ${file} is not valid JSON: ${describeError(error)}`, { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new AuthError(`Credential file ${file} must contain a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

function requireString(record: Record<string, unknown>, key: string, file: string): string {
    const value = record[key];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new AuthError(`Credential file ${file} is malformed: "${key}" is missing`);
    }
    return value;
}

function isEncryptedEnvelope(record: Record<string, unknown>): boolean {
    return 'ciphertext' in record;
}

async function decryptEnvelope(envelope: Record<string, unknown>, password: string, file: string): Promise<string> {
    const salt = Buffer.from(requireString(envelope, 'salt', file), 'base64');
    const nonce = Buffer.from(requireString(envelope, 'nonce', file), 'base64');
    const tag = Buffer.from(requireString(envelope, 'tag', file), 'base64');
    const ciphertext = Buffer.from(requireString(envelope, 'ciphertext', file), 'base64');

    const key = await derivePbkdf2Key(password, salt, PBKDF2_ITERATIONS, KEY_LENGTH, 'sha256');
    try {
        const decipher = createDecipheriv('aes-256-gcm', key, nonce);
        decipher.setAuthTag(tag);
        return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf-8');
    } catch (error) {
        throw new AuthError(`Could not decrypt credential file ${file}: wrong password or corrupted data`, {
            cause: error
        });
    }
}

async function loadCredentialFile(file: string, password: PasswordSource): Promise<CredentialContent> {
    const content = await readText(file);
    const record = parseCredentialJson(content, file);
    if (!isEncryptedEnvelope(record)) {
        return { record, json: content, encrypted: false };
    }

    const json = await decryptEnvelope(record, await password(file), file);
    return { record: parseCredentialJson(json, file), json, encrypted: true };
}

/**
 * True when the file holds an encrypted envelope. Read and parse failures
 * surface as AuthErrors here, before the pipeline starts.
 */
export async function isEncryptedCredentialFile(file: string): Promise<boolean> {
    return isEncryptedEnvelope(parseCredentialJson(await readText(file), file));
}

/**
 * Read a GCP service account key file
 *
 * //? Only the fields gcloud needs are checked; gcloud itself verifies the key
 */
export async function readServiceAccountKey(
    file: string,
    password: PasswordSource = passwordFromEnv
): Promise<ServiceAccountKey> {
    const { record, json, encrypted } = await loadCredentialFile(file, password);

    if (record.type !== 'service_account') {
        throw new AuthError(`Credential file ${file} is malformed: expected "type": "service_account"`);
    }
    requireString(record, 'private_key', file);

    return {
        clientEmail: requireString(record, 'client_email', file),
        projectId: typeof record.project_id === 'string' ? record.project_id : undefined,
        decryptedKey: encrypted ? json : undefined
    };
}

export async function readAwsAccessKey(file: string, password: PasswordSource = passwordFromEnv): Promise<AwsAccessKey> {
    const { record } = await loadCredentialFile(file, password);

    return {
        accessKeyId: requireString(record, 'accessKeyId', file),
        secretAccessKey: requireString(record, 'secretAccessKey', file),
        sessionToken: typeof record.sessionToken === 'string' ? record.sessionToken : undefined
    };
}
