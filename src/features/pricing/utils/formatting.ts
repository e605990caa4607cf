/**
 * Display formatting for reports (pt-BR conventions).
 */

import { format } from 'date-fns';
import { ptBR } from 'date-fns/locale';

const amountFormatter = new Intl.NumberFormat('pt-BR', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export const formatCurrencyBRL = (value: number): string => {
  const formatted = amountFormatter.format(Math.abs(value));
  return value < 0 ? `-R$ ${formatted}` : `R$ ${formatted}`;
};

export const formatPercent = (value: number): string => `${amountFormatter.format(value)}%`;

export const formatReportDate = (date: Date): string =>
  format(date, 'dd/MM/yyyy HH:mm', { locale: ptBR });
