/** 마켓 식별자: 'KRW-BTC' 형식 (quote-base) */
export type Ticker = string;

export interface TickerParts {
  readonly quote: string;   // 예: KRW
  readonly base: string;    // 예: BTC
}

/** 틱마다 생성되는 현재가 샘플 (저장하지 않음) */
export interface PriceSample {
  readonly price: number;
  readonly signedChangeRate: number;   // 전일 대비 등락률 (0.012 = +1.2%)
  readonly observedAt: number;         // Unix ms
  /** ticker = 현재가 API, trades = 최근 체결 폴백 */
  readonly source: 'ticker' | 'trades';
}

/** RSI 계산용 종가 시퀀스 (과거 → 최신) */
export type CandleSeries = readonly number[];

/** 최근 체결 1건 (차트 표시용) */
export interface TradeTick {
  readonly price: number;
  readonly volume: number;
  readonly timestamp: number;
  readonly side: 'BUY' | 'SELL';
}

/** 마켓 목록 항목 (티커 검색 UI용) */
export interface QuoteMarket {
  readonly market: Ticker;
  readonly koreanName: string;
  readonly englishName: string;
}
