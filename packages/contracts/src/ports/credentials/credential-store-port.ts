import type { CredentialRecord } from "../../types/records.js";

export interface CredentialStorePort {
  findByUsername(username: string): Promise<CredentialRecord | undefined>;
}
