import 'reflect-metadata';
import { createPrivateKey, randomBytes, webcrypto } from 'node:crypto';
import * as x509 from '@peculiar/x509';
import type { Logger } from 'pino';
import type { Credential } from '@credential-providers/models';
import { BaseCredentialBackend } from '@credential-providers/core';
import type { CertificateConfig, KeyAlgorithm, SignAlgorithm } from './types.js';

x509.cryptoProvider.set(webcrypto);

const DAY_MS = 24 * 60 * 60 * 1000;
const RSA_MODULUS_LENGTH = 2048;
const RSA_PUBLIC_EXPONENT = new Uint8Array([1, 0, 1]);

export interface KeyAlgorithms {
  generate: webcrypto.RsaHashedKeyGenParams | webcrypto.EcKeyGenParams;
  signing: webcrypto.RsaHashedImportParams | webcrypto.EcdsaParams;
  /** PEM flavour of the exported private key */
  privateKeyType: 'pkcs1' | 'sec1';
}

/**
 * WebCrypto parameters for a key and signature algorithm pair: RSA 2048 with
 * PKCS#1 v1.5 signatures, or ECDSA on P-256.
 */
export function keyAlgorithmsFor(key: KeyAlgorithm, sign: SignAlgorithm): KeyAlgorithms {
  const hash = sign === 'SHA512' ? 'SHA-512' : 'SHA-256';
  if (key === 'ECDSA') {
    return {
      generate: { name: 'ECDSA', namedCurve: 'P-256' },
      signing: { name: 'ECDSA', hash },
      privateKeyType: 'sec1',
    };
  }
  const rsa = {
    name: 'RSASSA-PKCS1-v1_5',
    hash,
    modulusLength: RSA_MODULUS_LENGTH,
    publicExponent: RSA_PUBLIC_EXPONENT,
  };
  return { generate: rsa, signing: rsa, privateKeyType: 'pkcs1' };
}

/**
 * Random positive 128-bit serial number.
 */
export function randomSerialNumber(): bigint {
  let serial = 0n;
  while (serial === 0n) {
    serial = BigInt(`0x${randomBytes(16).toString('hex')}`);
  }
  return serial;
}

/**
 * DER INTEGER content of a positive serial, as hex.
 */
export function serialNumberHex(serial: bigint): string {
  let hex = serial.toString(16);
  if (hex.length % 2 === 1) {
    hex = `0${hex}`;
  }
  // a leading bit would make the integer negative
  return /^[89a-f]/.test(hex) ? `00${hex}` : hex;
}

function subjectName(config: CertificateConfig): x509.JsonName {
  const name: x509.JsonName = [];
  if (config.country) {
    name.push({ C: [config.country] });
  }
  if (config.organization) {
    name.push({ O: [config.organization] });
  }
  name.push({ CN: [config.commonName] });
  return name;
}

export interface CertificateBackendOptions {
  logger: Logger;
  now?: () => Date;
  serialNumber?: () => bigint;
}

/**
 * Self-signed server certificates. Nothing is stored anywhere, so revoke has
 * nothing to do.
 */
export class CertificateBackend extends BaseCredentialBackend<CertificateConfig> {
  private readonly now: () => Date;
  private readonly serialNumber: () => bigint;

  public constructor(options: CertificateBackendOptions) {
    super('certificate', options.logger);
    this.now = options.now ?? (() => new Date());
    this.serialNumber = options.serialNumber ?? randomSerialNumber;
  }

  protected async doCreate(config: CertificateConfig): Promise<Credential> {
    const algorithms = keyAlgorithmsFor(config.keyAlgorithm, config.signAlgorithm);
    const keys = await webcrypto.subtle.generateKey(algorithms.generate, true, ['sign', 'verify']);

    const serial = this.serialNumber();
    const notBefore = this.now();
    const notAfter = new Date(notBefore.getTime() + config.expirationDays * DAY_MS);

    const extensions: x509.Extension[] = [
      new x509.BasicConstraintsExtension(false, undefined, true),
      new x509.KeyUsagesExtension(
        x509.KeyUsageFlags.digitalSignature | x509.KeyUsageFlags.keyEncipherment,
        true,
      ),
      new x509.ExtendedKeyUsageExtension([x509.ExtendedKeyUsage.serverAuth]),
    ];
    if (config.subjectAltNames.length > 0) {
      extensions.push(
        new x509.SubjectAlternativeNameExtension(
          config.subjectAltNames.map((value) => ({ type: 'dns' as const, value })),
        ),
      );
    }

    const certificate = await x509.X509CertificateGenerator.createSelfSigned({
      serialNumber: serialNumberHex(serial),
      name: subjectName(config),
      notBefore,
      notAfter,
      signingAlgorithm: algorithms.signing,
      keys,
      extensions,
    });

    const pkcs8 = await webcrypto.subtle.exportKey('pkcs8', keys.privateKey);
    const privateKeyPem = createPrivateKey({ key: Buffer.from(pkcs8), format: 'der', type: 'pkcs8' })
      .export({ type: algorithms.privateKeyType, format: 'pem' })
      .toString();

    const id = serial.toString(10);
    this.logger.info(
      { serialNumber: id, notAfter: notAfter.toISOString(), keyAlgorithm: config.keyAlgorithm },
      'issued self-signed certificate',
    );

    return {
      id,
      payload: {
        certificate_base64: Buffer.from(certificate.toString('pem')).toString('base64'),
        private_key_base64: Buffer.from(privateKeyPem).toString('base64'),
      },
    };
  }

  protected async doRevoke(credentialId: string): Promise<void> {
    this.logger.debug({ serialNumber: credentialId }, 'self-signed certificates are not revoked');
  }
}
