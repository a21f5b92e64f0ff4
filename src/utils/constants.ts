// OKX v5 endpoints
export const OKX_REST_URL = "https://www.okx.com";
export const OKX_WS_PUBLIC_URL = "wss://ws.okx.com:8443/ws/v5/public";
export const OKX_WS_PRIVATE_URL = "wss://ws.okx.com:8443/ws/v5/private";
export const OKX_WS_PAPER_PUBLIC_URL = "wss://wspap.okx.com:8443/ws/v5/public";
export const OKX_WS_PAPER_PRIVATE_URL = "wss://wspap.okx.com:8443/ws/v5/private";

// Checksum covers this many levels per side
export const CHECKSUM_DEPTH = 25;

export const DEFAULT_INSTRUMENT = "BTC-USDT-SWAP";
export const DEFAULT_BOOK_CHANNEL = "books-l2-tbt";
export const DEFAULT_TRADE_CHANNEL = "trades";

export const KEEPALIVE_PING = "ping";
export const KEEPALIVE_PONG = "pong";

// Max order ids per cancel-batch-orders request
export const OKX_CANCEL_BATCH_LIMIT = 20;
