// ImportEntriesUseCase - Replace the entry log with the content of an export

import { EntryStore } from "../../entities/entry-store.ts";
import { TtError } from "../../entities/errors.ts";
import type { ImportOutput } from "../../entities/outputs.ts";
import type {
  EntryRepository,
  EntrySource,
} from "../../ports/entry-repository.ts";

export class ImportEntriesUseCase {
  constructor(private readonly repo: EntryRepository) {}

  async execute(source: EntrySource): Promise<ImportOutput> {
    // Only the incoming side must be valid: a corrupt store can be restored
    const incoming = new EntryStore(await source.load());
    const replaced = await this.countCurrent();

    await this.repo.save(incoming.list());
    return { imported: incoming.size, replaced };
  }

  private async countCurrent(): Promise<number | null> {
    try {
      return (await this.repo.load()).length;
    } catch (e) {
      if (e instanceof TtError && e.code === "corrupt_store") {
        return null;
      }
      throw e;
    }
  }
}
