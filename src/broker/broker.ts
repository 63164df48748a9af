import { BrokerSettings } from '../core/config';
import { ConfigError } from '../core/errors';
import { FileTokenProvider, StaticTokenProvider } from '../integrations/tokenStore';
import { TradeStationClient } from '../integrations/tradestationClient';
import { Brokerage } from './broker.types';
import { StubBroker } from './broker.stub';
import { TradeStationBroker } from './tradestation/tradestationBroker';

export const getBroker = (settings: BrokerSettings, fetchImpl?: typeof fetch): Brokerage => {
  if (settings.provider === 'stub') {
    if (!settings.stubAccountFile) {
      throw new ConfigError('BROKER_PROVIDER=stub needs STUB_ACCOUNT_FILE');
    }
    console.log(`Using stub broker seeded from ${settings.stubAccountFile}`);
    return StubBroker.fromFile(settings.stubAccountFile);
  }
  const tokens = settings.accessToken
    ? new StaticTokenProvider(settings.accessToken)
    : new FileTokenProvider(settings.tokenStorePath, settings.tokenStoreEncryptionKey);
  return new TradeStationBroker(new TradeStationClient({ baseUrl: settings.baseUrl, tokens, fetchImpl }));
};

export { StubBroker, TradeStationBroker };
