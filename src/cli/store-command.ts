import { Command } from "clipanion";
import { errorMessage, openStores, type OpenedStores } from "./stores.js";

/** Base for commands that work directly on the session stores. */
export abstract class StoreCommand extends Command {
  protected abstract readonly exclusive: boolean;

  protected abstract run(stores: OpenedStores): Promise<void>;

  async execute(): Promise<void> {
    let stores: OpenedStores;
    try {
      stores = await openStores({ exclusive: this.exclusive });
    } catch (err) {
      this.context.stdout.write(`Cannot open session stores: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      await this.run(stores);
    } finally {
      await stores.close();
    }
  }
}
