import { BusConnectionError } from '../errors';

export interface ClientKeyPair {
  key: string;
  cert?: string;
}

const PRIVATE_KEY_BLOCK =
  /-----BEGIN ((?:RSA |EC |ENCRYPTED )?PRIVATE KEY)-----[\s\S]+?-----END \1-----/;
const CERTIFICATE_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Split a PEM bundle into the client private key and its certificate chain.
 * Environment variables often arrive with literal "\n" sequences, so those
 * are expanded first.
 */
export function parseClientKeyPair(bundle: string): ClientKeyPair {
  const pem = bundle.includes('\\n') ? bundle.replace(/\\n/g, '\n') : bundle;

  const key = pem.match(PRIVATE_KEY_BLOCK);
  if (!key) {
    throw new BusConnectionError('failed to parse client credential: no private key block found');
  }

  const certs = pem.match(CERTIFICATE_BLOCK);

  return {
    key: key[0],
    cert: certs ? certs.join('\n') : undefined,
  };
}
