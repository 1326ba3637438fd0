/**
 * ログから除去するキー
 * WireGuard 設定には秘密鍵が含まれるため、本文・エンコード済みの両方を対象にする
 */
export const REDACT_KEYS = [
  "clientSecret",
  "*.clientSecret",
  "password",
  "*.password",
  "secret",
  "*.secret",
  "wireGuardConf",
  "*.wireGuardConf",
  "userData",
  "*.userData",
  "customData",
  "*.customData",
];

export const REDACT_CENSOR = "[REDACTED]";
