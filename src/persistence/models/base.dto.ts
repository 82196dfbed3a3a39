/**
 * Columns every table in the ledger carries.
 */
export interface BaseDTO {
  create_dttm: string;
}
