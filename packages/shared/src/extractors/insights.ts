/**
 * Insight Generator
 *
 * Derives payoff guidance from the statement balance and minimum payment.
 * Interest is a simple-interest estimate at a flat 18% nominal annual
 * rate, not a compounding schedule. Unparseable or non-positive amounts
 * produce no insights rather than an error.
 */

import { config } from '../config';
import { logger } from '../logger';
import type { ExtractedFields, Insight } from '../types';
import { parseAmount } from './field-normalizer';

export const ANNUAL_INTEREST_RATE = 0.18;
export const HIGH_BALANCE_THRESHOLD = 5000;
export const LONG_PAYOFF_MONTHS = 24;
export const RECOMMENDED_PAYOFF_MONTHS = 12;

export interface InsightOptions {
  currencySymbol?: string;
}

export function formatAmount(amount: number, currencySymbol: string): string {
  return `${currencySymbol}${amount.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

export function generateInsights(
  fields: Pick<ExtractedFields, 'total_balance' | 'minimum_payment'>,
  options: InsightOptions = {}
): Insight[] {
  const currency = options.currencySymbol ?? config.currencySymbol;
  const balance = parseAmount(fields.total_balance);
  const minimumPayment = parseAmount(fields.minimum_payment);

  if (balance === null || minimumPayment === null) {
    logger.debug('Skipping insights, amounts not numeric', {
      total_balance: fields.total_balance,
      minimum_payment: fields.minimum_payment,
    });
    return [];
  }

  if (balance <= 0 || minimumPayment <= 0) {
    return [];
  }

  const insights: Insight[] = [];

  if (balance > HIGH_BALANCE_THRESHOLD) {
    insights.push({
      type: 'warning',
      title: 'High Balance Alert',
      message: `Balance of ${formatAmount(balance, currency)} is significant. Consider paying more than minimum.`,
      priority: 'high',
    });
  }

  const monthsToPayoff = balance / minimumPayment;
  const estimatedInterest = balance * ANNUAL_INTEREST_RATE * (monthsToPayoff / 12);

  if (monthsToPayoff > LONG_PAYOFF_MONTHS) {
    insights.push({
      type: 'critical',
      title: 'Long Payoff Period',
      message: `Paying minimum only will take ${Math.trunc(monthsToPayoff)} months. Estimated interest: ${formatAmount(estimatedInterest, currency)}`,
      priority: 'critical',
    });
  }

  const recommendedPayment = balance / RECOMMENDED_PAYOFF_MONTHS;
  if (recommendedPayment > minimumPayment) {
    const savings = estimatedInterest - balance * ANNUAL_INTEREST_RATE;
    if (savings > 0) {
      insights.push({
        type: 'info',
        title: 'Smart Payment Tip',
        message: `Pay ${formatAmount(recommendedPayment, currency)}/month to save ~${formatAmount(savings, currency)} in interest`,
        priority: 'medium',
      });
    }
  }

  return insights;
}
