import { CredentialStore } from '../../services/credentialStore.js';
import { config } from '../../utils/config.js';
import { Prompter } from '../prompts.js';

function createStore(): CredentialStore {
  return new CredentialStore({ dataDir: config.dataDir, encryptionKey: config.encryptionKey });
}

export async function setCredentialCommand(namespace: string, field: string): Promise<void> {
  const prompter = new Prompter();
  let value: string;
  try {
    value = await prompter.ask(`Value for ${namespace}.${field}`);
  } finally {
    prompter.close();
  }
  if (value === '') {
    throw new Error('Empty value, nothing stored');
  }

  await createStore().set(namespace, field, value);
  console.log(`Stored ${namespace}.${field}`);
}

export async function deleteCredentialCommand(namespace: string, field: string): Promise<void> {
  const removed = await createStore().delete(namespace, field);
  console.log(removed ? `Deleted ${namespace}.${field}` : `${namespace}.${field} was not set`);
}

export async function listCredentialsCommand(): Promise<void> {
  const entries = Object.entries(await createStore().list());
  if (entries.length === 0) {
    console.log('No credentials stored');
    return;
  }
  for (const [namespace, fields] of entries) {
    console.log(`${namespace}: ${fields.join(', ')}`);
  }
}
