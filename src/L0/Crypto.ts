// src/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';
import type { Address, ChainID, PromiseID } from './Ontology.js';

// Synchronous ed25519 needs a sha512 implementation.
ed.utils.sha512Sync = (...messages: Uint8Array[]): Uint8Array => {
    const h = createHash('sha512');
    for (const m of messages) h.update(m);
    return new Uint8Array(h.digest());
};

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical Serialization (sorted keys, no whitespace)
export type Canonical = string | number | boolean | null | Canonical[] | { [key: string]: Canonical };

export function canonicalize(value: Canonical): string {
    if (Array.isArray(value)) {
        return `[${value.map(canonicalize).join(',')}]`;
    }
    if (value !== null && typeof value === 'object') {
        const keys = Object.keys(value).sort();
        return `{${keys.map(k => `${JSON.stringify(k)}:${canonicalize(value[k] ?? null)}`).join(',')}}`;
    }
    return JSON.stringify(value);
}

// 1.3 Deterministic Identifiers
export function deriveId(...parts: (string | number)[]): PromiseID {
    return `0x${hash(canonicalize(parts))}`;
}

/**
 * Remote promise id for a cross-chain registration. Pure: the same parent,
 * destination and registration nonce always give the same id on every chain.
 */
export function remotePromiseId(parentId: PromiseID, destination: ChainID, nonce: number): PromiseID {
    return deriveId('remote', parentId, destination, nonce);
}

export function continuationId(parentId: PromiseID, nonce: number): PromiseID {
    return deriveId('then', parentId, nonce);
}

/**
 * Address a named component is deployed at. Identical on every chain.
 */
export function deployedAddress(name: string): Address {
    return `0x${hash(`deploy:${name}`).slice(0, 40)}`;
}

// 1.4 Digital Signatures (Ed25519)
export type Ed25519PublicKey = string; // Hex encoded
export type Ed25519PrivateKey = string; // Hex encoded
export type Signature = string; // Hex encoded

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export function generateKeyPair(): KeyPair {
    const privateKey = ed.utils.randomPrivateKey();
    return {
        publicKey: Buffer.from(ed.sync.getPublicKey(privateKey)).toString('hex'),
        privateKey: Buffer.from(privateKey).toString('hex')
    };
}

export function signData(data: Uint8Array, privateKey: Ed25519PrivateKey): Signature {
    return Buffer.from(ed.sync.sign(data, privateKey)).toString('hex');
}

export function verifySignature(data: Uint8Array, signature: Signature, publicKey: Ed25519PublicKey): boolean {
    try {
        return ed.sync.verify(signature, data, publicKey);
    } catch {
        return false;
    }
}
