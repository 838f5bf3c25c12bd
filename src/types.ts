export type RequestId = string | number | null;

export interface JsonRpcRequest {
  id?: RequestId;
  method: string; // '' when the frame carried no usable method
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorBody {
  code: number;
  message: string;
}

export type JsonRpcResponse =
  | { jsonrpc: '2.0'; id?: RequestId; result: unknown }
  | { jsonrpc: '2.0'; id?: RequestId; error: JsonRpcErrorBody };

export interface WeatherInfoArguments {
  cities: string[]; // max 20, enforced by the backend
}

export interface CityWeather {
  temperature: number; // °C
  condition: string;
  humidity: number; // %
  wind_speed: number; // km/h
}

export interface WeatherInfoResponse {
  timestamp: string;
  results: Record<string, CityWeather>;
}

/** A decoded reply with its cities in the order the backend wrote them. */
export interface WeatherReport {
  timestamp: string;
  cities: Array<[city: string, weather: CityWeather]>;
}

export interface BackendReply {
  status: number;
  body: string;
}
