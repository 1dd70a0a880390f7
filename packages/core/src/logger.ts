import { consola, type ConsolaInstance } from "consola";

export type Logger = ConsolaInstance;

export const logger: Logger = consola.withTag("flow-registry");
