import { Column, Entity, PrimaryColumn } from 'typeorm';

// One bond holding as persisted. yield_rate is stored as a fraction.
@Entity('bonds')
export class BondRow {
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

  @Column('real')
  coupon!: number;

  @Column('real', { name: 'yield_rate' })
  yieldRate!: number;

  @Column('text', { name: 'purchase_date' })
  purchaseDate!: string;
}
