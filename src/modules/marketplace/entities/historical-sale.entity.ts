import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';

@Entity('historical_sales')
export class HistoricalSale {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  @Index()
  assetId!: string; // uint256 as decimal string

  @Column()
  sellerAddress!: string;

  @Column()
  buyerAddress!: string;

  @Column({ type: 'numeric', precision: 78, scale: 0 }) // Smallest currency unit, read back as string
  salePrice!: string;

  @Column()
  currency!: string; // Zero address for native, token address otherwise

  @Column({ type: 'numeric', precision: 78, scale: 0 })
  royaltyAmount!: string;

  @Column({ unique: true })
  eventSequence!: number;

  @Column({ type: 'timestamptz' })
  timestamp!: Date;
}
