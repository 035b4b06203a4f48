import { GtxConf } from '@gtx/conf';
import { getLanguageByISO, Language } from '@gtx/lang';
import { createTranslator } from '@gtx/translator';

const conf = new GtxConf({ get: (key) => process.env[key] });
const translator = createTranslator(conf);

const [text, to, from] = process.argv.slice(2);

if (!text || !to) {
  console.error('Usage: translate <text> <to> [from]');
  process.exit(1);
}

const target = getLanguageByISO(to);
const source = from ? getLanguageByISO(from) : Language.auto;

if (!target || !source) {
  console.error(`Unknown language: ${!target ? to : from}`);
  process.exit(1);
}

const result = await translator.translateLite(text, source, target);

console.log(result.mergedTranslation);
