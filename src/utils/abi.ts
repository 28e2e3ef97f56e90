import { Interface, InterfaceAbi } from 'ethers';
import path from 'path';
import fs from 'fs';

// ABI cache to avoid repeated parsing
const abiCache = new Map<string, Interface>();

/**
 * Common ABIs as constants for quick access
 */
export const ERC20_ABI = [
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function decimals() view returns (uint8)',
  'function totalSupply() view returns (uint256)',
  'function balanceOf(address owner) view returns (uint256)',
  'function transfer(address to, uint256 amount) returns (bool)',
  'function approve(address spender, uint256 amount) returns (bool)',
  'function allowance(address owner, address spender) view returns (uint256)',
  'event Transfer(address indexed from, address indexed to, uint256 value)',
  'event Approval(address indexed owner, address indexed spender, uint256 value)',
];

export const ROUTER02_ABI = [
  'function factory() view returns (address)',
  'function WETH() view returns (address)',
  'function getAmountsOut(uint amountIn, address[] path) view returns (uint[] amounts)',
  'function getAmountsIn(uint amountOut, address[] path) view returns (uint[] amounts)',
  'function swapExactTokensForTokens(uint amountIn, uint amountOutMin, address[] path, address to, uint deadline) returns (uint[] amounts)',
  'function swapExactETHForTokens(uint amountOutMin, address[] path, address to, uint deadline) payable returns (uint[] amounts)',
  'function swapExactTokensForETH(uint amountIn, uint amountOutMin, address[] path, address to, uint deadline) returns (uint[] amounts)',
  'function swapExactTokensForETHSupportingFeeOnTransferTokens(uint amountIn, uint amountOutMin, address[] path, address to, uint deadline)',
];

export const FACTORY_ABI = [
  'function getPair(address tokenA, address tokenB) view returns (address pair)',
  'function allPairs(uint) view returns (address pair)',
  'function allPairsLength() view returns (uint)',
  'event PairCreated(address indexed token0, address indexed token1, address pair, uint)',
];

export type ContractName = 'erc20' | 'router02' | 'factory';

/**
 * Interface instances for the contracts the client talks to
 */
export const interfaces: Record<ContractName, Interface> = {
  erc20: new Interface(ERC20_ABI),
  router02: new Interface(ROUTER02_ABI),
  factory: new Interface(FACTORY_ABI),
};

/**
 * Look up the interface of a known contract by name.
 */
export function loadContractInterface(name: ContractName): Interface {
  return interfaces[name];
}

/**
 * Load ABI from JSON file (plain ABI array or Hardhat/Truffle artifact)
 */
export function loadAbiFromFile(filePath: string): Interface {
  const absolutePath = path.resolve(filePath);
  const cached = abiCache.get(absolutePath);
  if (cached) {
    return cached;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to load ABI from ${filePath}: ${error}`);
  }

  const iface = new Interface(extractAbi(parsed, filePath));
  abiCache.set(absolutePath, iface);
  return iface;
}

function extractAbi(parsed: unknown, filePath: string): InterfaceAbi {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  // Truffle/Hardhat artifact format
  if (typeof parsed === 'object' && parsed !== null && 'abi' in parsed && Array.isArray(parsed.abi)) {
    return parsed.abi;
  }
  throw new Error(`No ABI array found in ${filePath}`);
}

/**
 * PancakeSwap V2 deployment on BNB Smart Chain
 */
export const BSC_ADDRESSES = {
  WBNB: '0xbb4CdB9CBd36B01bD1cBaEBF2De08d9173bc095c',
  PANCAKESWAP_V2_ROUTER: '0x10ED43C718714eb63d5aA57B78B54704E256024E',
  PANCAKESWAP_V2_FACTORY: '0xcA143Ce32Fe78f1f7019d7d551a6402fC5350c73',
} as const;
