import { Account, SorobanRpc, StrKey, xdr } from '@stellar/stellar-sdk';
import { SorobanPoolManagerClient } from '../src/contracts/pool-manager';
import { NetworkError, ValidationError } from '../src/errors';
import { Logger } from '../src/types/common';

describe('SorobanPoolManagerClient', () => {
  const RPC_URL = 'https://soroban-testnet.stellar.org';
  const NETWORK_PASSPHRASE = 'Test SDF Network ; September 2015';
  const MANAGER = StrKey.encodeContract(Buffer.alloc(32, 9));
  const SOURCE = 'GAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAWHF';
  const POOL = 'ab'.repeat(32);

  let client: SorobanPoolManagerClient;
  let logger: Logger & { debug: jest.Mock; info: jest.Mock; error: jest.Mock };
  let mockGetAccount: jest.SpyInstance;
  let mockSimulateTransaction: jest.SpyInstance;

  beforeEach(() => {
    logger = { debug: jest.fn(), info: jest.fn(), error: jest.fn() };
    client = new SorobanPoolManagerClient(
      MANAGER,
      RPC_URL,
      NETWORK_PASSPHRASE,
      { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5 },
      logger,
    );

    mockGetAccount = jest
      .spyOn(SorobanRpc.Server.prototype, 'getAccount')
      .mockResolvedValue(new Account(SOURCE, '1'));
    mockSimulateTransaction = jest.spyOn(SorobanRpc.Server.prototype, 'simulateTransaction');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function mockSuccessfulSimulation(retval: xdr.ScVal | undefined) {
    mockSimulateTransaction.mockResolvedValue({
      result: retval ? { retval, auth: [] } : undefined,
      latestLedger: 12345,
      events: [],
      transactionData: '',
      minResourceFee: '100',
      cost: { cpuInsns: '0', memBytes: '0' },
    } as unknown as SorobanRpc.Api.SimulateTransactionResponse);

    jest.spyOn(SorobanRpc.Api, 'isSimulationSuccess').mockReturnValue(true);
  }

  function mockFailedSimulation(error: string) {
    mockSimulateTransaction.mockResolvedValue({
      error,
      latestLedger: 12345,
      events: [],
    } as unknown as SorobanRpc.Api.SimulateTransactionResponse);

    jest.spyOn(SorobanRpc.Api, 'isSimulationSuccess').mockReturnValue(false);
    jest.spyOn(SorobanRpc.Api, 'isSimulationError').mockReturnValue(true);
  }

  describe('getCurrentTick()', () => {
    it('parses an i32 tick', async () => {
      mockSuccessfulSimulation(xdr.ScVal.scvI32(-120));
      await expect(client.getCurrentTick(POOL)).resolves.toBe(-120);
      expect(mockGetAccount).toHaveBeenCalledWith(SOURCE);
      expect(mockSimulateTransaction).toHaveBeenCalledTimes(1);
    });

    it('normalises the pool key before the call', async () => {
      mockSuccessfulSimulation(xdr.ScVal.scvI32(7));
      await expect(client.getCurrentTick('0x' + POOL.toUpperCase())).resolves.toBe(7);
      expect(logger.debug).toHaveBeenCalledWith('PoolManager: get_tick', { contract: MANAGER, pool: POOL });
    });

    it('rejects a value of the wrong type', async () => {
      mockSuccessfulSimulation(xdr.ScVal.scvU32(7));
      await expect(client.getCurrentTick(POOL)).rejects.toThrow(ValidationError);
    });

    it('rejects a tick outside int24', async () => {
      mockSuccessfulSimulation(xdr.ScVal.scvI32(9_000_000));
      await expect(client.getCurrentTick(POOL)).rejects.toThrow(ValidationError);
    });

    it('throws NetworkError when the simulation returns nothing', async () => {
      mockSuccessfulSimulation(undefined);
      await expect(client.getCurrentTick(POOL)).rejects.toThrow(NetworkError);
    });

    it('throws NetworkError with the decoded contract error', async () => {
      mockFailedSimulation('HostError: Error(Contract, #101)');
      await expect(client.getCurrentTick(POOL)).rejects.toThrow(
        'Simulation of get_tick failed: Contract Error (101): Oracle not enabled',
      );
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('rejects a malformed pool key before any RPC', async () => {
      await expect(client.getCurrentTick('xyz')).rejects.toThrow(ValidationError);
      expect(mockGetAccount).not.toHaveBeenCalled();
    });
  });

  describe('getMaxTicksPerBlock()', () => {
    it('parses a u32', async () => {
      mockSuccessfulSimulation(xdr.ScVal.scvU32(50));
      await expect(client.getMaxTicksPerBlock(POOL)).resolves.toBe(50);
    });
  });

  describe('retries', () => {
    it('retries transient RPC failures', async () => {
      mockGetAccount
        .mockRejectedValueOnce(new Error('ECONNRESET'))
        .mockResolvedValue(new Account(SOURCE, '1'));
      mockSuccessfulSimulation(xdr.ScVal.scvI32(3));

      await expect(client.getCurrentTick(POOL)).resolves.toBe(3);
      expect(mockGetAccount).toHaveBeenCalledTimes(2);
      expect(logger.debug).toHaveBeenCalledWith('PoolManager_getAccount: retrying after 1ms', {
        attempt: 1,
        maxRetries: 2,
        error: 'ECONNRESET',
      });
    });

    it('maps exhausted retries to NetworkError', async () => {
      mockGetAccount.mockRejectedValue(new Error('ECONNRESET'));

      await expect(client.getCurrentTick(POOL)).rejects.toThrow(NetworkError);
      expect(mockGetAccount).toHaveBeenCalledTimes(3);
    });

    it('does not retry permanent failures', async () => {
      mockGetAccount.mockRejectedValue(new Error('Account not found'));

      await expect(client.getCurrentTick(POOL)).rejects.toThrow('Account not found');
      expect(mockGetAccount).toHaveBeenCalledTimes(1);
    });
  });
});
