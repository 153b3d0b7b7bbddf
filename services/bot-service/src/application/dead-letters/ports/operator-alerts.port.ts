export const OPERATOR_ALERTS_PORT = Symbol('OPERATOR_ALERTS_PORT');

export interface OperatorAlert {
  queue: string;
  text: string;
}

export interface OperatorAlertsPort {
  sendAlert(alert: OperatorAlert): Promise<void>;
}
