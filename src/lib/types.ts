export type IsoDateTime = string;

export type IndexType = 'etccdi' | 'hsi';
export type Timestep = 'yr' | 'mon' | 'day';
export type ArchiveFormat = 'tgz' | 'zip';

/**
 * Filename shape of an index type.
 *
 * `product-coded` names embed the product code and end in `_v1-0.<ext>`,
 * e.g. `tn90pETCCDI_mon_BCC-CSM2-MR_ssp585_r1i1p1f1_b1981-2010_v20191108_201501-210012_v1-0.nc`.
 * `model-first` names look like `<var>_<INDEX>_<tstep>_<MODEL>_<exp>_<...>.<ext>`.
 */
export type FilenameFamily = 'product-coded' | 'model-first';

export interface IndexDefinition {
  name: IndexType;
  family: FilenameFamily;
  timesteps: Timestep[];
  formats: ArchiveFormat[];
}

/** One row of the `file` table. */
export interface CatalogRecord {
  filename: string;
  location: string; // <index>/<product>/<timestep>/<experiment>/<model>
  modifiedAt: IsoDateTime;
  sizeBytes: number;
  indexType: string;
  product: string;
  timestep: string;
  experiment: string;
  model: string;
  ensemble: string;
  variable: string;
}

export interface FileRow {
  filename: string;
  location: string;
  modified_at: IsoDateTime;
  size: number;
  index_type: string;
  product: string;
  timestep: string;
  experiment: string;
  model: string;
  ensemble: string;
  variable: string;
}

/** A single (index, product, timestep, experiment, model) combination; `%` marks a wildcard. */
export interface SelectionKey {
  index: IndexType;
  product: string;
  timestep: Timestep;
  experiment: string;
  model: string;
}

export interface ExpectedFile {
  variable: string;
  regex: RegExp;
}
