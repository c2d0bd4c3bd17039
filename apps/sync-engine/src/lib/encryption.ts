import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 16;

export function parseEncryptionKey(hexKey: string): Buffer {
    // Key needs to be 64 hex characters for AES-256
    if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
        throw new Error('Encryption key must be 64 hex characters (32 bytes)');
    }
    return Buffer.from(hexKey, 'hex');
}

export function encrypt(plaintext: string, key: Buffer): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, key, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    // Format: iv:authTag:encrypted (all hex)
    return `${iv.toString('hex')}:${cipher.getAuthTag().toString('hex')}:${encrypted}`;
}

export function decrypt(ciphertext: string, key: Buffer): string {
    const parts = ciphertext.trim().split(':');
    if (parts.length !== 3) {
        throw new Error('Invalid ciphertext format');
    }

    const [ivHex, authTagHex, encrypted] = parts;
    const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(ivHex, 'hex'));
    decipher.setAuthTag(Buffer.from(authTagHex, 'hex'));

    let decrypted = decipher.update(encrypted, 'hex', 'utf8');
    decrypted += decipher.final('utf8');
    return decrypted;
}

export function generateEncryptionKey(): string {
    return randomBytes(32).toString('hex');
}
