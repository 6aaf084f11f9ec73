export interface LogoSetting {
  filename: string;
  updatedAt: string;
}
