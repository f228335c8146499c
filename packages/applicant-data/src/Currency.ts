import { ParseError } from "./error"

// Either correctly grouped thousands ("1,234,567") or plain digits, then optionally exactly
// two decimal digits.
const DOLLARS_REGEX = /^(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?$/

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",")
}

/**
 * An amount of US currency, held as a whole number of cents.
 */
export class Currency {
  constructor(readonly cents: number) {}

  /**
   * Parses a dollars string such as `"1,234.50"` or `"12"`.
   */
  static parse(dollars: string): Currency {
    if (!DOLLARS_REGEX.test(dollars)) {
      throw new ParseError(
        `Currency must be a number with at most two decimals: "${dollars}"`,
        dollars
      )
    }
    const [whole, fraction = "00"] = dollars.replace(/,/g, "").split(".")
    const cents = Number.parseInt(whole, 10) * 100 + Number.parseInt(fraction, 10)
    if (!Number.isSafeInteger(cents)) {
      throw new ParseError(`Currency amount is too large: "${dollars}"`, dollars)
    }
    return new Currency(cents)
  }

  getDollars(): number {
    return this.cents / 100
  }

  /**
   * The amount as `1234.50`, without grouping or symbol.
   */
  getDollarsString(): string {
    const sign = this.cents < 0 ? "-" : ""
    const abs = Math.abs(this.cents)
    return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, "0")}`
  }

  /**
   * The amount as `$1,234.50`.
   */
  prettyPrint(): string {
    const sign = this.cents < 0 ? "-" : ""
    const abs = Math.abs(this.cents)
    const dollars = groupThousands(String(Math.floor(abs / 100)))
    return `${sign}$${dollars}.${String(abs % 100).padStart(2, "0")}`
  }

  equals(other: Currency): boolean {
    return this.cents === other.cents
  }
}
