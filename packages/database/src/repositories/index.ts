export { BaseRepository } from './base.repository'
export { TranslationRepository, toTranslationEntity } from './translation.repository'
export { TagRepository, toTagEntity } from './tag.repository'
