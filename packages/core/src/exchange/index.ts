export type { BarRequest, MarketDataClient } from "./MarketDataClient";
