/**
 * 環境変数の読み込みとバリデーション
 * Debug 表示モードと構造化ログの設定を管理
 */
import { z } from "zod";

// 環境変数スキーマ定義
const envSchema = z.object({
  // testing 構成（Debug 表示で実値を表示）。"true" / "1" のみ有効
  REDACTIVE_TESTING: z
    .string()
    .optional()
    .transform((v) => v === "true" || v === "1"),

  // 構造化ログの出力先（JSONLファイル）。未設定なら stderr
  REDACTIVE_LOG_PATH: z.string().optional(),

  // 出力する最小ログレベル
  REDACTIVE_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  // 実行環境
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * 任意の環境変数オブジェクトを検証する
 * 本番環境では REDACTIVE_TESTING の有効化を禁止
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  const env = result.data;

  if (env.NODE_ENV === "production" && env.REDACTIVE_TESTING) {
    throw new Error("ENV_VALIDATION_FAILED: REDACTIVE_TESTING must not be enabled in production");
  }

  return env;
}

/**
 * process.env を読み込み、バリデーションを実行（結果はキャッシュ）
 */
export function loadEnv(): Env {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

/**
 * テスト用: キャッシュをクリア
 */
export function clearEnvCache(): void {
  cachedEnv = null;
}
