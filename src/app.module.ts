import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BlockchainModule } from './modules/blockchain/blockchain.module';
import { AssetsModule } from './modules/assets/assets.module';
import { PaymentsModule } from './modules/payments/payments.module';
import { RoyaltiesModule } from './modules/royalties/royalties.module';
import { MarketplaceModule } from './modules/marketplace/marketplace.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        url: configService.get<string>('DATABASE_URL'),
        synchronize: configService.get('NODE_ENV') !== 'production', // Only synchronize in non-production
        ssl: configService.get('NODE_ENV') === 'production'
          ? { rejectUnauthorized: false }
          : false,
        extra: {
          max: 20, // Maximum connections in the pool
          connectionTimeoutMillis: 5000
        },
        autoLoadEntities: true,
      }),
      inject: [ConfigService],
    }),
    BlockchainModule,
    AssetsModule,
    PaymentsModule,
    RoyaltiesModule,
    MarketplaceModule,
  ],
})
export class AppModule {}
