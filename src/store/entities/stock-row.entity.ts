import { Column, Entity, PrimaryColumn } from 'typeorm';

// One equity holding as persisted. purchase_id is the upsert key.
@Entity('stocks')
export class StockRow {
  @PrimaryColumn('text', { name: 'purchase_id' })
  purchaseId!: string;

  @Column('text')
  symbol!: string;

  @Column('integer')
  quantity!: number;

  @Column('real', { name: 'purchase_price' })
  purchasePrice!: number;

  @Column('real', { name: 'current_price' })
  currentPrice!: number;

  @Column('text', { name: 'purchase_date' })
  purchaseDate!: string;      // MM/DD/YYYY as read from the input file
}
