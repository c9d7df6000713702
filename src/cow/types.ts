/**
 * JSON shapes exchanged with the auction coordinator. Amounts are integer
 * token atoms encoded as decimal strings; addresses are hex strings.
 */

export interface WireToken {
  decimals: number;
  /** Numeraire per whole token, as a decimal string */
  referencePrice?: string | null;
}

export interface WireAuction {
  id: string;
  tokens: { [address: string]: WireToken };
  orders: WireOrder[];
  liquidity: WireLiquidity[];
  deadline: string;
  numeraire?: string;
}

export interface WireOrder {
  uid: string;
  sellToken: string;
  buyToken: string;
  sellAmount: string;
  buyAmount: string;
  kind: 'sell' | 'buy';
  partiallyFillable: boolean;
  validTo: number;
  feeAmount?: string;
  /** Unix seconds */
  createdAt?: number;
  /** Solver whose quote won for this order */
  quoteSolver?: string;
}

export interface WireLiquidity {
  kind: string; // "ConstantProduct" / "UniswapV2", "WeightedProduct", "Stable"
  id: string;
  tokens: string[];
  reserves: string[];
  /** Fee as a fraction, e.g. "0.003" */
  fee: string;
  weights?: string[]; // For Balancer
  amplificationParameter?: string; // For Curve
}

export interface WireSolution {
  id: number;
  /** Token -> price scaled so that sell atoms * sell price = buy atoms * buy price */
  prices: { [token: string]: string };
  trades: WireTrade[];
  interactions: WireInteraction[];
  score: string;
}

export interface WireTrade {
  kind: 'fulfillment';
  order: string; // UID
  /** Atoms of the order's fixed side */
  executedAmount: string;
  fee: string;
}

export interface WireInteraction {
  kind: 'liquidity';
  internalize: boolean;
  id: string;
  inputToken: string;
  outputToken: string;
  inputAmount: string;
  outputAmount: string;
}

export interface SolverResponse {
  solutions: WireSolution[];
}

export interface WireQuote {
  amount: string;
  interactions: WireInteraction[];
  clearingPrices: { [token: string]: string };
}

export interface WireError {
  kind: string;
  description: string;
}
