import type { CredentialRecord } from "@latchkey/contracts";

import type { PostgresDataSource } from "../postgres-data-source.js";

export interface PostgresSeedData {
  readonly credentials?: ReadonlyArray<CredentialRecord>;
}

export const seedPostgresDataSource = async (
  dataSource: PostgresDataSource,
  seed: PostgresSeedData,
): Promise<void> => {
  for (const credential of seed.credentials ?? []) {
    await dataSource.credentialStore.insertCredential(credential);
  }
};
