import type { Catalog } from '@/core/catalog/catalog';
import type { GridModel, GridOutputs } from '@/types/grid';

/**
 * Collaborator owning the domain computation and the document format.
 * The document store only routes values in and out of it.
 *
 * `serialize` and `deserialize` are fallible: they throw when the model
 * cannot be written or the text cannot be interpreted.
 */
export interface ModelCalculator {
  createDefault(): GridModel;
  calculate(model: GridModel, catalog: Catalog): GridOutputs;
  serialize(model: GridModel): string;
  deserialize(text: string, catalog: Catalog): GridModel;
}
