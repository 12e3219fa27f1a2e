export interface SchemaSourceProvider {
  /**
   * Must return the same schema for the same deployment state.
   */
  getSchemaString(): string | Promise<string>;
}

export class StaticSchemaSourceProvider implements SchemaSourceProvider {
  constructor(private readonly schema: string) {}

  getSchemaString(): string {
    return this.schema;
  }
}
