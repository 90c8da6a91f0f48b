export { MarkovModel, createKeyCodec, type KeyCodec, type MarkovNode, type NgramKey } from './entities/MarkovModel'
export { buildModel, buildWordModel, NgramChainBuilder, DEFAULT_NGRAM_SIZE, type BuildOptions } from './ModelBuilder'
export { walk, generate, DEFAULT_CHAIN_LENGTH, type DeadEndPolicy, type WalkOptions } from './ChainGenerator'
export {
    generateSentence, trimToSentence, isSentenceEnd, sentenceStartKeys,
    SENTENCE_END, MIN_SENTENCE_LENGTH, DEFAULT_MAX_ATTEMPTS, type SentenceOptions
} from './SentenceGenerator'
export { tokenize, ngrams, readLines } from './Tokenizer'
export {
    serializeModel, deserializeModel, deserializeWordModel, saveModel, loadModel, loadWordModel,
    MODEL_FORMAT_VERSION, type JSONToken, type SerializedModel
} from './ModelStore'
