import type { CredentialRecord, CredentialStorePort } from "@latchkey/contracts";

export interface MemoryCredentialStoreOptions {
  readonly initialCredentials?: ReadonlyArray<CredentialRecord>;
}

export class MemoryCredentialStore implements CredentialStorePort {
  private readonly byUsername = new Map<string, CredentialRecord>();

  constructor(options: MemoryCredentialStoreOptions = {}) {
    for (const record of options.initialCredentials ?? []) {
      this.register(record);
    }
  }

  async findByUsername(username: string): Promise<CredentialRecord | undefined> {
    const record = this.byUsername.get(username);
    return record ? { ...record } : undefined;
  }

  register(record: CredentialRecord): void {
    if (this.byUsername.has(record.username)) {
      throw new Error(`Credential for ${record.username} already exists`);
    }
    this.byUsername.set(record.username, { ...record });
  }
}

export const createMemoryCredentialStore = (
  options?: MemoryCredentialStoreOptions,
): MemoryCredentialStore => new MemoryCredentialStore(options);
