export enum ResponseOutcome {
  SUCCESS = 'success',
  NOT_FOUND = 'not_found',
  BACKEND_ERROR = 'backend_error',
}

export enum MerchantOperation {
  CREATE_ORDER = 'createOrder',
  GET_ORDER = 'getOrder',
  PROCESS_REFUND = 'processRefund',
}

export class ResponseStatusMapper {
  // Operations for which a 404 is an expected, empty result
  private static notFoundOutcomes = new Map<MerchantOperation, ResponseOutcome>([
    [MerchantOperation.CREATE_ORDER, ResponseOutcome.BACKEND_ERROR],
    [MerchantOperation.GET_ORDER, ResponseOutcome.NOT_FOUND],
    [MerchantOperation.PROCESS_REFUND, ResponseOutcome.NOT_FOUND],
  ]);

  static toOutcome(operation: MerchantOperation, status: number): ResponseOutcome {
    if (status >= 200 && status < 300) {
      return ResponseOutcome.SUCCESS;
    }

    if (status === 404) {
      return this.notFoundOutcomes.get(operation) ?? ResponseOutcome.BACKEND_ERROR;
    }

    return ResponseOutcome.BACKEND_ERROR;
  }
}
