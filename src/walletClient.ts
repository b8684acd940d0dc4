import path from 'path';
import {
  Client,
  Metadata,
  ServiceClientConstructor,
  ServiceError,
  credentials,
  loadPackageDefinition,
} from '@grpc/grpc-js';
import { loadSync } from '@grpc/proto-loader';
import type { ConnectionMonitor } from './connectionMonitor.js';
import { AppError, errorMessage } from './errors.js';
import type { TokenInfo, TradeExecutionRequest, TradeExecutionResponse, WalletInfo } from './types.js';
import { isRecord, readBoolean, readNullableString, readNumber, readString } from './utils/jsonGuards.js';

export const DEFAULT_PROTO_PATH = path.join(process.cwd(), 'proto', 'wallet.proto');
const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Custody service holding the server wallet. This process only reads its
 * balances and reports executed copy trades.
 */
export interface WalletService {
  getWalletInfo(): Promise<WalletInfo>;
  handleTradeExecution(request: TradeExecutionRequest): Promise<TradeExecutionResponse>;
}

function parseTokenInfo(value: unknown): TokenInfo | null {
  if (!isRecord(value)) return null;
  const address = readString(value, 'address');
  if (!address) return null;
  const metadataUri = readNullableString(value, 'metadata_uri');
  return {
    address,
    symbol: readString(value, 'symbol') ?? '',
    name: readString(value, 'name') ?? '',
    balance: readString(value, 'balance') ?? '0',
    metadata_uri: metadataUri ? metadataUri : null,
    decimals: readNumber(value, 'decimals') ?? 0,
    market_cap: readNumber(value, 'market_cap') ?? 0,
  };
}

export function parseWalletInfo(value: unknown): WalletInfo {
  if (!isRecord(value)) {
    throw new AppError('RequestError', 'Wallet service returned an empty wallet info response');
  }
  const address = readString(value, 'address');
  const balance = readNumber(value, 'balance');
  if (address === undefined || balance === undefined) {
    throw new AppError('RequestError', 'Wallet info response is missing address or balance');
  }

  const rawTokens = value['tokens'];
  const tokens: TokenInfo[] = [];
  if (Array.isArray(rawTokens)) {
    for (const raw of rawTokens) {
      const token = parseTokenInfo(raw);
      if (token) tokens.push(token);
    }
  }
  return { balance, tokens, address };
}

export function parseTradeExecutionResponse(value: unknown): TradeExecutionResponse {
  if (!isRecord(value)) {
    return { success: false, error: 'empty response' };
  }
  const error = readNullableString(value, 'error');
  return {
    success: readBoolean(value, 'success') ?? false,
    error: error ? error : null,
  };
}

function isServiceConstructor(value: unknown): value is ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

function loadWalletServiceConstructor(protoPath: string): ServiceClientConstructor {
  const packageDefinition = loadSync(protoPath, {
    keepCase: true,
    longs: Number,
    enums: String,
    defaults: true,
    oneofs: true,
  });
  const loaded: unknown = loadPackageDefinition(packageDefinition);
  const walletPackage = isRecord(loaded) ? loaded['wallet'] : undefined;
  const service = isRecord(walletPackage) ? walletPackage['WalletService'] : undefined;
  if (!isServiceConstructor(service)) {
    throw new AppError('InitializationError', `wallet.WalletService not found in ${protoPath}`);
  }
  return service;
}

export interface GrpcWalletClientOptions {
  protoPath?: string;
  timeoutMs?: number;
  connectionMonitor?: ConnectionMonitor;
}

/**
 * gRPC client for the wallet service. The service definition is read from
 * the .proto file at construction.
 */
export class GrpcWalletClient implements WalletService {
  private readonly client: Client;
  private readonly constructorRef: ServiceClientConstructor;
  private readonly timeoutMs: number;
  private readonly connectionMonitor: ConnectionMonitor | undefined;

  constructor(address: string, options: GrpcWalletClientOptions = {}) {
    this.constructorRef = loadWalletServiceConstructor(options.protoPath ?? DEFAULT_PROTO_PATH);
    this.client = new this.constructorRef(address, credentials.createInsecure());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.connectionMonitor = options.connectionMonitor;
  }

  async getWalletInfo(): Promise<WalletInfo> {
    return parseWalletInfo(await this.unary('GetWalletInfo', {}));
  }

  async handleTradeExecution(request: TradeExecutionRequest): Promise<TradeExecutionResponse> {
    return parseTradeExecutionResponse(await this.unary('HandleTradeExecution', request));
  }

  close(): void {
    this.client.close();
    this.connectionMonitor?.updateStatus('Grpc', 'Disconnected');
  }

  private unary(methodName: string, request: object): Promise<unknown> {
    const method = this.constructorRef.service[methodName];
    if (!method) {
      return Promise.reject(new AppError('RequestError', `Unknown wallet service method ${methodName}`));
    }

    return new Promise<unknown>((resolve, reject) => {
      this.client.makeUnaryRequest(
        method.path,
        (value: object): Buffer => method.requestSerialize(value),
        (buffer: Buffer): unknown => method.responseDeserialize(buffer),
        request,
        new Metadata(),
        { deadline: Date.now() + this.timeoutMs },
        (error: ServiceError | null, response?: unknown) => {
          if (error) {
            this.connectionMonitor?.updateStatus('Grpc', 'Error', `${methodName}: ${error.details || error.message}`);
            reject(new AppError('RequestError', `${methodName} failed: ${errorMessage(error)}`, { cause: error }));
            return;
          }
          this.connectionMonitor?.updateStatus('Grpc', 'Connected');
          resolve(response);
        }
      );
    });
  }
}
