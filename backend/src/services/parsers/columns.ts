import type { ColumnDefinition } from '../../types/import.js';

export const int = (name: string): ColumnDefinition => ({ name, kind: 'int' });
export const float = (name: string): ColumnDefinition => ({ name, kind: 'float' });
export const flag = (name: string): ColumnDefinition => ({ name, kind: 'flag' });
export const text = (name: string): ColumnDefinition => ({ name, kind: 'text' });
export const date = (name: string): ColumnDefinition => ({ name, kind: 'date' });
export const varchar = (name: string, length: number): ColumnDefinition => ({ name, kind: 'varchar', length });
