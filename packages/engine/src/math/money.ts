import Decimal from 'decimal.js';

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
  groupSeparator: string;
  decimalSeparator: string;
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  BRL: { symbol: 'R$', position: 'prefix', groupSeparator: '.', decimalSeparator: ',' },
  USD: { symbol: '$', position: 'prefix', groupSeparator: ',', decimalSeparator: '.' },
  EUR: { symbol: '€', position: 'suffix', groupSeparator: '.', decimalSeparator: ',' },
  GBP: { symbol: '£', position: 'prefix', groupSeparator: ',', decimalSeparator: '.' },
};

export function formatMoney(amount: number, currency = 'BRL', fractionDigits = 0): string {
  const rounded = new Decimal(amount).toDecimalPlaces(fractionDigits, Decimal.ROUND_HALF_UP);
  const isNegative = rounded.isNegative() && !rounded.isZero();
  const [intPart, fracPart] = rounded.abs().toFixed(fractionDigits).split('.');

  const config = CURRENCY_CONFIG[currency];
  const groupSeparator = config?.groupSeparator ?? ' ';
  const decimalSeparator = config?.decimalSeparator ?? '.';

  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, groupSeparator);
  const absStr = fracPart === undefined ? grouped : `${grouped}${decimalSeparator}${fracPart}`;
  const sign = isNegative ? '-' : '';

  if (config) {
    if (config.position === 'prefix') {
      return `${sign}${config.symbol} ${absStr}`;
    }
    return `${sign}${absStr} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${sign}${absStr} ${currency}`;
}

export function sumAmounts(amounts: number[]): number {
  return amounts.reduce((acc, val) => acc.plus(val), new Decimal(0)).toNumber();
}
