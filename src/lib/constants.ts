export const DEFAULT_TOP_N = 10;

export const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
    USD: '$', INR: '₹', EUR: '€', GBP: '£', JPY: '¥',
    AUD: 'A$', CAD: 'C$', SGD: 'S$', AED: 'د.إ', CHF: 'Fr',
};

export const REPORT_DEFAULTS = {
    title: 'Sales Performance Analysis Report',
    preparedBy: 'Sales Analytics',
    subtitle: 'Sales Data Analysis Project',
    currency: 'INR',
    topN: DEFAULT_TOP_N,
    outputPath: 'Sales_Performance_Report.xlsx',
} as const;
