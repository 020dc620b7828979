import { Layer } from "effect";
import { ConfigLive, DatabaseLive, RecordsLive } from "../services";

// ============================================================================
// Live Layer Composition
// ============================================================================

// Database layer requires Config
const DatabaseLayer = DatabaseLive.pipe(Layer.provide(ConfigLive));

// Records layer requires Database
const RecordsLayer = RecordsLive.pipe(Layer.provide(DatabaseLayer));

// Full application layer for commands that touch the record store
export const AppLayer = Layer.mergeAll(ConfigLive, RecordsLayer);
