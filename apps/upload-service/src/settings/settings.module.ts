/**
 * Settings Module
 * Binds ApplicationSettings to the loaded configuration
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APPLICATION_SETTINGS, ConfigApplicationSettings } from './application-settings';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: APPLICATION_SETTINGS,
      useClass: ConfigApplicationSettings,
    },
  ],
  exports: [APPLICATION_SETTINGS],
})
export class SettingsModule {}
