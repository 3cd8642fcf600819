export { normalizeName, cleanText, cleanCode, stripBom } from './normalize.js';
export { parseNumber } from './number.js';
export { formatMoney, formatQuantity } from './format.js';
