import { differenceInCalendarDays, parseISO } from 'date-fns';
import { CustomerProfile, DimCustomer, FactTransaction, SOURCES } from '@fanpulse/types';

export interface CustomerProfileOptions {
  /** Only amounts in this currency count towards spend */
  baseCurrency: string;
  sportsCategories: readonly string[];
  matchTicketCategory: string;
}

/**
 * Left-join fold of transactions onto customers: exactly one profile per
 * customer, zero-filled when the customer has no transactions
 */
export class CustomerProfileBuilder {
  private readonly options: CustomerProfileOptions;

  constructor(options: CustomerProfileOptions) {
    this.options = options;
  }

  build(customers: readonly DimCustomer[], transactions: readonly FactTransaction[]): CustomerProfile[] {
    const byCustomer = new Map<string, FactTransaction[]>();
    for (const transaction of transactions) {
      const bucket = byCustomer.get(transaction.customer_id);
      if (bucket) {
        bucket.push(transaction);
      } else {
        byCustomer.set(transaction.customer_id, [transaction]);
      }
    }

    return customers.map(customer => this.profile(customer, byCustomer.get(customer.customer_id) ?? []));
  }

  private profile(customer: DimCustomer, facts: readonly FactTransaction[]): CustomerProfile {
    const { baseCurrency, sportsCategories, matchTicketCategory } = this.options;

    // Spend is summed in integer cents; facts without an amount still count as transactions
    const baseAmounts = facts
      .filter(fact => fact.currency === baseCurrency)
      .flatMap(fact => (fact.amount === null ? [] : [fact.amount]));
    const spendCents = baseAmounts.reduce((sum, amount) => sum + Math.round(amount * 100), 0);

    const days = facts.map(fact => fact.transaction_date.slice(0, 10)).sort();
    const firstDay = days.length > 0 ? days[0] : null;
    const lastDay = days.length > 0 ? days[days.length - 1] : null;

    const sportsCount = facts.filter(fact => fact.category !== null && sportsCategories.includes(fact.category)).length;

    let avgDaysBetween: number | null = null;
    if (firstDay !== null && lastDay !== null && facts.length > 1) {
      const span = differenceInCalendarDays(parseISO(lastDay), parseISO(firstDay));
      avgDaysBetween = round(span / (facts.length - 1), 1);
    }

    return {
      customer_id: customer.customer_id,
      txn_count: facts.length,
      total_spend: spendCents / 100,
      avg_txn: baseAmounts.length > 0 ? Math.round(spendCents / baseAmounts.length) / 100 : null,
      foreign_currency_txn_count: facts.filter(fact => fact.currency !== baseCurrency).length,
      first_txn_date: firstDay,
      last_txn_date: lastDay,
      match_ticket_count: facts.filter(fact => fact.category === matchTicketCategory).length,
      sports_affinity_ratio: facts.length > 0 ? round(sportsCount / facts.length, 2) : null,
      avg_days_between_txns: avgDaysBetween,
      _source: SOURCES.CUSTOMERS,
      _lineage: [...customer._lineage],
      _fact_lineage: facts.flatMap(fact => fact._lineage).sort((a, b) => a - b)
    };
  }
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export default CustomerProfileBuilder;
