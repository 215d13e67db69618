export * from './types/index.js';
export * from './errors/MiningError.js';
export * from './config/EngineConfig.js';
export * from './utils/fixedPoint.js';

export { KeyedMutex } from './concurrency/KeyedMutex.js';
export type { Release } from './concurrency/KeyedMutex.js';
export { RecordContext, Transaction } from './concurrency/RecordContext.js';
export type { TransactionEffect } from './concurrency/RecordContext.js';

export { InMemoryStore } from './store/RecordStore.js';
export type { RecordBatch, RecordStore, StoredRecord } from './store/RecordStore.js';
export { JsonFileStore } from './store/JsonFileStore.js';
export { parseBalanceEntry, parseLedgerRecord } from './store/recordSchema.js';
export * from './store/keys.js';

export * from './token/SupplyLedger.js';
export { HalvingSchedule } from './token/HalvingSchedule.js';
export type { Accrual, EpochInfo } from './token/HalvingSchedule.js';
export * from './token/RewardEngine.js';
export { TokenLedger } from './token/TokenLedger.js';
export type { BalanceEntry, FungibleToken, TokenTransaction } from './token/TokenLedger.js';

export { EquipmentNft } from './equipment/EquipmentNft.js';
export type { NonFungibleAsset } from './equipment/EquipmentNft.js';
export { DEFAULT_BOX_TIERS, WeightedBoxSource } from './equipment/BoxOpener.js';
export type { BoxDraw, HashPowerSource, RandomInt } from './equipment/BoxOpener.js';
export { EquipmentRegistry } from './equipment/EquipmentRegistry.js';
export type { RegistrationChange } from './equipment/EquipmentRegistry.js';

export { FixedRateOracle } from './sale/PriceOracle.js';
export type { ExchangeRateOracle, FixedRateConfig } from './sale/PriceOracle.js';
export { ReferralGraph } from './sale/ReferralGraph.js';
export { createSaleStats, SaleEngine, splitPurchase, validateSaleConfig } from './sale/SaleEngine.js';
export type { BoxOptions, SaleEngineOptions } from './sale/SaleEngine.js';

export { AdminControl, DEFAULT_ACTION_DELAY_SECONDS } from './admin/AdminControl.js';
export { MiningEngine, balanceFileFor } from './engine/MiningEngine.js';
export type { EngineDependencies } from './engine/MiningEngine.js';
export { MiningEventBus } from './engine/MiningEventBus.js';
export { ApiServer } from './api/ApiServer.js';
export type { ApiRequest, ApiResponse } from './api/ApiServer.js';
export { createLogger } from './utils/logger.js';
