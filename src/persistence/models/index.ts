export * from './base.dto';
export * from './base.model';
export * from './BuildDTO';
export * from './BuildModel';
export * from './SqlDiffDTO';
export * from './SqlDiffModel';
