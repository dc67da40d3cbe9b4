import { ethers } from "ethers";
import { Engine } from "../../engine";
import { createEngineMetrics } from "../../metrics";
import { MockAggregatorV3, MockDebtToken, MockERC20, addr } from "./mocks";

export const CUSTODY = addr(0xe0);
export const USER = addr(101);
export const USER2 = addr(102);
export const LIQUIDATOR = addr(103);

export const ETH_PRICE = 2000n * 10n ** 8n; // $2000, 8-decimal feed
export const BTC_PRICE = 1000n * 10n ** 8n; // $1000, 8-decimal feed
export const START_TIME = 1_700_000_000;

export function deployEngineFixture() {
  let now = START_TIME;
  const clock = () => now;
  const setTime = (t: number) => {
    now = t;
  };

  const weth = new MockERC20(addr(1), CUSTODY);
  const wbtc = new MockERC20(addr(2), CUSTODY); // 8 token decimals
  const ethFeed = new MockAggregatorV3(addr(11), 8, ETH_PRICE, clock);
  const btcFeed = new MockAggregatorV3(addr(12), 8, BTC_PRICE, clock);
  const debtToken = new MockDebtToken(addr(20), CUSTODY);
  const metrics = createEngineMetrics();

  const engine = new Engine({
    collateralTokens: [weth, wbtc],
    priceFeeds: [ethFeed, btcFeed],
    tokenDecimals: [18, 8],
    debtToken,
    custody: CUSTODY,
    clock,
    metrics,
  });

  for (const account of [USER, USER2, LIQUIDATOR]) {
    weth.give(account, ethers.parseEther("1000"));
    wbtc.give(account, ethers.parseUnits("100", 8));
  }

  return { engine, weth, wbtc, ethFeed, btcFeed, debtToken, metrics, clock, setTime };
}
